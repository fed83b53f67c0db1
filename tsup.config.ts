import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts', 'src/adapter/astexplorer.ts'],
  format: ['cjs', 'esm'],
  target: 'node20',
  dts: true,
  sourcemap: true,
  clean: true,
})
