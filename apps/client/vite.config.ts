import path from 'path';
import { defineConfig } from 'vite';

const sharedSrc = path.resolve(__dirname, '../../packages/shared/src');

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@shared$/, replacement: sharedSrc },
      { find: /^@shared\/(.*)$/, replacement: `${sharedSrc}/$1` },
    ],
  },
  server: {
    port: 5173,
  },
});
