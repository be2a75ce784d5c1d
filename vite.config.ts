import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(() => {
    const base = process.env.VITE_BASE_PATH || '/';
    const apiTarget = process.env.VITE_API_TARGET || `http://localhost:${process.env.PORT || 3001}`;
    return {
      base: base,
      server: {
        port: 3000,
        host: '0.0.0.0',
        proxy: {
          '/api': {
            target: apiTarget,
            changeOrigin: true,
          }
        }
      },
      plugins: [react()],
    };
});
