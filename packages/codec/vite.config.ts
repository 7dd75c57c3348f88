import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

export default defineConfig({
  build: {
    lib: {
      entry: 'src/index.ts',
      name: 'TribbleCodec',
      fileName: 'index'
    },
    rollupOptions: {
      // Ternary primitives are a peer package, never bundled
      external: ['@tribble/ternary']
    }
  },
  plugins: [dts({ outDir: 'dist', exclude: ['src/__tests__'] })]
})
