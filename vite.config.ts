import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import { fileURLToPath } from 'node:url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  plugins: [
    dts({ include: ['src'] })
  ],
  build: {
    target: 'node20',
    lib: {
      entry: {
        index: `${root}src/index.ts`,
        main: `${root}src/main.ts`,
      },
      formats: ['es'],
    },
    rollupOptions: {
      external: [
        'adze',
        'better-sqlite3',
        'cron',
        'dotenv',
        'telegraf',
        'zod',
        /^node:/,
      ]
    }
  }
})
