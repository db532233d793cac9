import { defineConfig } from '@playwright/test';

// No browser projects: every test exercises Node code directly
export default defineConfig({
  testDir: './tests',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  timeout: 30000,
});
