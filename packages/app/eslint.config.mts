// @ts-check
import eslint from "@eslint/js"
import * as effectEslint from "@effect/eslint-plugin"
import sonarjs from "eslint-plugin-sonarjs"
import vitest from "eslint-plugin-vitest"
import globals from "globals"
import tseslint from "typescript-eslint"

export default tseslint.config(
  eslint.configs.recommended,
  tseslint.configs.strictTypeChecked,
  effectEslint.configs.dprint,
  {
    name: "analyzers",
    languageOptions: {
      parser: tseslint.parser,
      globals: { ...globals.node },
      parserOptions: {
        projectService: true,
        tsconfigRootDir: import.meta.dirname
      }
    },
    plugins: { sonarjs },
    files: ["**/*.ts"],
    rules: {
      ...sonarjs.configs.recommended.rules,
      "no-restricted-imports": ["error", {
        paths: [
          { name: "ts-pattern", message: "Use Effect.Match instead of ts-pattern." },
          { name: "zod", message: "Use @effect/schema for schemas and validation." }
        ]
      }],
      "no-restricted-syntax": [
        "error",
        {
          selector: "TryStatement",
          message: "Use Effect.try / catchAll instead of try/catch in core and app."
        },
        {
          selector: "SwitchStatement",
          message: "Use Effect.Match instead of switch."
        },
        {
          selector: "FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
          message: "Use Effect.gen / Effect.tryPromise instead of async/await."
        }
      ],
      complexity: ["error", 8],
      "max-params": ["error", 5],
      "max-depth": ["error", 4],
      "max-lines": ["error", { max: 300, skipBlankLines: true, skipComments: true }],
      "object-shorthand": "error",
      "no-throw-literal": "error",
      "@typescript-eslint/restrict-template-expressions": ["error", {
        allowNumber: true,
        allowBoolean: true,
        allowNullish: false
      }],
      "@typescript-eslint/array-type": ["warn", { default: "generic", readonly: "generic" }],
      "@typescript-eslint/consistent-type-imports": "warn",
      "@typescript-eslint/no-unused-vars": ["error", {
        argsIgnorePattern: "^_",
        varsIgnorePattern: "^_"
      }],
      "@effect/dprint": ["error", {
        config: {
          indentWidth: 2,
          lineWidth: 120,
          semiColons: "asi",
          quoteStyle: "alwaysDouble",
          trailingCommas: "never",
          operatorPosition: "maintain",
          "arrowFunction.useParentheses": "force"
        }
      }]
    }
  },
  {
    files: ["tests/**"],
    plugins: { vitest },
    rules: {
      ...vitest.configs.recommended.rules,
      "max-lines": "off",
      "sonarjs/no-empty-test-file": "off"
    }
  },
  { ignores: ["dist/**", "coverage/**", "drizzle/**"] }
)
