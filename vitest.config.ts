import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include:     ['tests/**/*.test.ts'],
        environment: 'node',
        env:         {
            MCP_HOST_SILENT: 'true',
        },
        testTimeout: 10000,
    },
});
