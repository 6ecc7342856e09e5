import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { VitePWA } from 'vite-plugin-pwa';

// Relative base so the build works from any sub-path.
const BASE = './';

export default defineConfig(() => {
  return {
    base: BASE,
    plugins: [
      react(),
      VitePWA({
        registerType: 'autoUpdate',
        // In dev, we keep SW disabled to avoid install loops while iterating locally.
        devOptions: { enabled: false },
        includeAssets: ['favicon.svg'],
        manifest: {
          name: 'Drowsiness Check',
          short_name: 'Drowsiness',
          description: 'Capture a photo and check it for signs of drowsiness',
          start_url: BASE,
          scope: BASE,
          display: 'standalone',
          background_color: '#0b0c12',
          theme_color: '#0b0c12',
          icons: [{ src: 'favicon.svg', sizes: 'any', type: 'image/svg+xml', purpose: 'any' }]
        },
        workbox: {
          // Detection requests must always hit the network.
          navigateFallbackDenylist: [/^\/api\//],
          runtimeCaching: [
            {
              urlPattern: ({ url }) => url.pathname.startsWith('/api/'),
              handler: 'NetworkOnly'
            }
          ]
        }
      })
    ]
  };
});
