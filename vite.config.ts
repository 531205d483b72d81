import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';
import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath, URL } from 'node:url';

export default defineConfig({
  plugins: [
    dts({
      insertTypesEntry: true,
      include: ['src/**/*'],
      exclude: ['**/*.test.ts', '**/*.spec.ts'],
    }),
  ],
  build: {
    lib: {
      entry: resolve(fileURLToPath(new URL('.', import.meta.url)), 'src/index.ts'),
      name: 'RetailSync',
      formats: ['es', 'cjs'],
      fileName: (format: string) => `index.${format === 'es' ? 'js' : 'cjs'}`,
    },
    rollupOptions: {
      // Database drivers and other dependencies stay in node_modules
      external: (id: string) => !id.startsWith('.') && !isAbsolute(id),
    },
    target: 'node20',
    sourcemap: true,
    minify: false, // Keep readable for debugging
  },
});
