import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// API server port, see server/src/config.ts
const API_TARGET = `http://localhost:${process.env.PORT ?? '8787'}`;

export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': {
        target: API_TARGET,
        changeOrigin: true,
        rewrite: (path) => path.replace(/^\/api/, ''),
      },
    },
  },
});
