export {
  getContentEncoding,
  negotiateEncoding,
  resolveContentEncoding,
} from './middleware.js';
export type { ErrorDocument } from './middleware.js';
