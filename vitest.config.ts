import ts from 'typescript';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    // Tests assert on function names, and esbuild renames named function
    // expressions that shadow an outer binding; transpile with tsc instead.
    esbuild: false,
    plugins: [
        {
            name: 'tsc-transpile',
            transform(code: string, id: string) {
                if (!/\.[cm]?tsx?$/.test(id.split('?')[0] ?? '')) return null;
                const out = ts.transpileModule(code, {
                    fileName: id,
                    compilerOptions: {
                        target: ts.ScriptTarget.ES2022,
                        module: ts.ModuleKind.ESNext,
                        sourceMap: true,
                        esModuleInterop: true,
                    },
                });
                return { code: out.outputText, map: out.sourceMapText ?? null };
            },
        },
    ],
    test: {
        include: ['src/**/*.test.ts'],
        pool: 'forks',
        poolOptions: {
            // cache.test.ts forces collections with global.gc()
            forks: { execArgv: ['--expose-gc'] },
        },
    },
});
