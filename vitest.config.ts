import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const lib = (name: string) => fileURLToPath(new URL(`./libs/${name}/src/index.ts`, import.meta.url));

const alias = {
  '@discovery-engine/http-core': lib('http-core'),
  '@discovery-engine/pagination': lib('pagination'),
  '@discovery-engine/discovery-client': lib('discovery-client'),
  '@discovery-engine/schema-reflection': lib('schema-reflection'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
