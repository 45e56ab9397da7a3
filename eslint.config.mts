import eslint from "@eslint/js";
import tseslint from "typescript-eslint";
import { defineConfig, globalIgnores } from "eslint/config";
import unicorn from 'eslint-plugin-unicorn';

export default defineConfig([
  eslint.configs.recommended,
  tseslint.configs.stylistic,
  tseslint.configs.recommendedTypeChecked,
  [globalIgnores(["dist/**"])],
  {
    plugins: {
      unicorn,
    },
    languageOptions: {
      parserOptions: {
        projectService: {
          allowDefaultProject: ['eslint.config.mts'],
        },
      },
    },
    rules: {
      "@typescript-eslint/consistent-type-definitions": ["error", "type"],
      "no-unused-vars": "off",
      "@typescript-eslint/no-unused-vars": [
        "error",
        {
          "args": "all",
          "argsIgnorePattern": "^_",
          "caughtErrors": "all",
          "caughtErrorsIgnorePattern": "^_",
          "destructuredArrayIgnorePattern": "^_",
          "varsIgnorePattern": "^_",
          "ignoreRestSiblings": true
        }
      ],
      "@typescript-eslint/no-floating-promises": ["error", {
        allowForKnownSafeCalls: [
          { from: "package", package: "node:test", name: ["it", "describe"] },
        ],
      }],
      "unicorn/prefer-node-protocol": "error",
      "unicorn/no-array-push-push": "error",
    }
  },
]);
