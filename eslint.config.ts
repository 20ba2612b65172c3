import js from '@eslint/js';
import eslintConfigPrettier from 'eslint-config-prettier';
import jsdoc from 'eslint-plugin-jsdoc';
import globals from 'globals';
import tseslint from 'typescript-eslint';

export default tseslint.config(
  {
    ignores: [
      '*.DS_Store',
      '**/node_modules',
      'dist',
      '**/coverage',
      '**/*.snap',
    ],
  },
  js.configs.recommended,
  tseslint.configs.recommended,
  jsdoc.configs['flat/contents-typescript'],
  eslintConfigPrettier,
  {
    rules: {
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          args: 'all',
          argsIgnorePattern: '^_',
          caughtErrors: 'all',
          caughtErrorsIgnorePattern: '^_',
          destructuredArrayIgnorePattern: '^_',
          varsIgnorePattern: '^_',
          ignoreRestSiblings: true,
        },
      ],
      'class-methods-use-this': 'off',
      'prefer-const': 'off',
      'no-redeclare': 'off',
      // We need to use no-redeclare from typescript-eslint otherwise
      // we cannot use ts function overloads.
      '@typescript-eslint/no-redeclare': [
        'error',
        { ignoreDeclarationMerge: false },
      ],
    },
  },
  {
    files: ['packages/**/src/**/*.ts'],
    rules: { 'no-console': 'error' },
  },
  {
    files: ['packages/**/*.ts', '*.ts'],
    languageOptions: { globals: { ...globals.node } },
  },
);
