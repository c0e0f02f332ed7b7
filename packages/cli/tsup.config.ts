import { defineConfig } from 'tsup'

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    target: 'node20',
    dts: true,
    sourcemap: true,
    clean: true,
    noExternal: ['keymint'],
  },
  {
    entry: ['src/bin.ts'],
    format: ['esm'],
    target: 'node20',
    sourcemap: true,
    clean: false,
    // The workspace package ships TypeScript sources, so it is bundled in.
    noExternal: ['keymint'],
  },
])
