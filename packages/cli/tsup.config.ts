import { defineConfig } from 'tsup'

export default defineConfig([
  {
    entry: ['src/bin.ts'],
    format: ['esm'],
    platform: 'node',
    target: 'node20',
    sourcemap: true,
    clean: true,
    treeshake: true,
    // workspace sources are TypeScript; bundle them into the binary
    noExternal: ['quorumseal'],
  },
])
