import { defineConfig } from 'tsup'

/**
 * Library build: one shared set of chunks for the root entry and the
 * sub-path entries, plus the CLI as its own entry.
 */
export default defineConfig({
    name: 'tank-descent',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/tasks': 'src/tasks/index.ts',

        // ==================== CLI ====================
        'src/tasks/tank-design/cli': 'src/tasks/tank-design/cli.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2022',
    platform: 'node',
})
