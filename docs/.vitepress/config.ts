import { readFileSync } from 'node:fs';
import { defineConfig } from 'vitepress';

const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg ? String(pkg.version) : '?';

// https://vitepress.dev/reference/site-config
export default defineConfig({
  title: 'xivapi-client',
  description: 'Unofficial promise-based TypeScript client for xivapi v2 with typed results and error-first ergonomics.',
  base: process.env.DOCS_BASE ?? '/',
  themeConfig: {
    search: {
      provider: 'local',
    },
    nav: [
      { text: 'Guide', link: '/guide/getting-started' },
      { text: `v${version}`, link: '/guide/getting-started' },
    ],
    sidebar: {
      '/guide/': [
        {
          text: 'Guide',
          items: [
            { text: 'Getting Started', link: '/guide/getting-started' },
            { text: 'Sheets and Rows', link: '/guide/sheets' },
            { text: 'Search', link: '/guide/search' },
            { text: 'Assets', link: '/guide/assets' },
          ],
        },
        {
          text: 'Features',
          items: [
            { text: 'Configuration', link: '/guide/configuration' },
            { text: 'Error Handling', link: '/guide/errors' },
          ],
        },
      ],
    },
  },
});
