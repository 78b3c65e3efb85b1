import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  banner: { js: '#!/usr/bin/env node' },
  // the keychain binding is a native add-on loaded on demand; never bundle it
  external: ['@napi-rs/keyring'],
});
