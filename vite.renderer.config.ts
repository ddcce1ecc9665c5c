import react from '@vitejs/plugin-react';
import autoprefixer from 'autoprefixer';
import { fileURLToPath } from 'node:url';
import tailwindcss from 'tailwindcss';
import { defineConfig } from 'vite';

const backendPort = Number(process.env.INOUT_PORT) || 3001;

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  server: {
    // The backend owns /ipc; during development Vite forwards to it
    proxy: {
      '/ipc': `http://localhost:${backendPort}`,
    },
  },
  css: {
    postcss: {
      plugins: [tailwindcss(), autoprefixer()],
    },
  },
  build: {
    outDir: 'dist/renderer',
    emptyOutDir: true,
  },
});
