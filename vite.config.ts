import { defineConfig } from 'vite'
import { fileURLToPath } from 'node:url'

// Library build: npm run build:lib (external three.js)
export default defineConfig({
    build: {
        lib: {
            entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
            formats: ['es'],
            fileName: 'index',
        },
        rollupOptions: {
            external: [/^three/],
        },
        target: 'es2022',
        outDir: 'dist',
    },
})
