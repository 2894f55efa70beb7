import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // Same bag, same markup.
  {
    files: ['src/ssr/**/*.ts', 'src/spec/**/*.ts', 'src/widgets/**/*.tsx'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message:
            'Avoid Math.random while rendering; markup must be reproducible.',
        },
        {
          object: 'Date',
          property: 'now',
          message:
            'Avoid Date.now while rendering; pass timestamps explicitly.',
        },
      ],
    },
  },
  {
    files: ['benches/**/*.ts', 'tests/**/*.ts', 'tests/**/*.tsx'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: {},
    },
    rules: {
      // Test doubles (fake DOM events, loose bags) are allowed to be loose.
      '@typescript-eslint/no-explicit-any': 'off',
    },
  },
];
