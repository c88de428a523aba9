/// <reference types="vite/client" />

// Build-mode flag for dev-only checks, defined by vite.config.ts / vitest.config.ts
declare const __DEV__: boolean;
