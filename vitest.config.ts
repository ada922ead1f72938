import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        watch: false,
        include: ['src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        pool: 'forks'
    }
})
