import { defineConfig } from 'vitest/config';
import { readFileSync, existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

// Load .env.test if present; its values override the defaults below
function loadEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  const env: Record<string, string> = {};
  for (const line of readFileSync(path, 'utf8').split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    env[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
  }
  return env;
}

const testEnv = {
  LOG_LEVEL: 'silent',
  INFERENCE_TRANSPORT: 'http',
  INFERENCE_ENDPOINT_URL: 'http://inference.test',
  ...loadEnvFile(fileURLToPath(new URL('./.env.test', import.meta.url))),
};

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: testEnv,
  },
});
