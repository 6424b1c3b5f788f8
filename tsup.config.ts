import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: true,
    // Minifying would rename functions, and caller prefixes come from function names
    minify: false,
    treeshake: true,
    outDir: 'dist',
    skipNodeModulesBundle: true
});
