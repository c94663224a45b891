import ts from 'typescript';
import { defineConfig, type Plugin } from 'vitest/config';

// esbuild renames function expressions that shadow their binding
// (`const add = register(async function add() {})` becomes `function add2`)
// and Vite always disables its `keepNames`; the tasks rely on `fn.name`,
// so tests are transpiled with the TypeScript compiler instead.
function typescriptTransform(): Plugin {
  return {
    name: 'typescript-transform',
    enforce: 'pre',
    transform(code, id) {
      const file = id.split('?')[0] ?? id;
      if (!/\.[cm]?tsx?$/.test(file) || file.includes('/node_modules/')) return null;
      const out = ts.transpileModule(code, {
        fileName: file,
        compilerOptions: {
          target: ts.ScriptTarget.ES2022,
          module: ts.ModuleKind.ESNext,
          sourceMap: true,
          inlineSources: true,
          isolatedModules: true,
          esModuleInterop: true,
        },
      });
      return { code: out.outputText, map: out.sourceMapText ? JSON.parse(out.sourceMapText) : null };
    },
  };
}

export default defineConfig({
  esbuild: false,
  plugins: [typescriptTransform()],
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 15_000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
