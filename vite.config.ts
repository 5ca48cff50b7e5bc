import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';

const isProd = process.env.NODE_ENV === 'production';

const entry = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  build: {
    lib: {
      entry: {
        index: entry('./src/index.ts'),
        core: entry('./src/core/index.ts'),
        error: entry('./src/error/index.ts'),
      },
    },
    outDir: 'dist',
    rollupOptions: {
      treeshake: true,
      output: [
        {
          format: 'es',
          entryFileNames: '[name].mjs',
          exports: 'named',
        },
        {
          format: 'cjs',
          entryFileNames: '[name].cjs',
          exports: 'named',
        },
      ],
    },
    sourcemap: !isProd,
  },
});
