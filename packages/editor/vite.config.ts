import { defineConfig } from 'vite'

export default defineConfig({
  build: {
    lib: {
      entry: 'src/index.ts',
      name: 'SeqTapeEditor',
      fileName: 'index',
      formats: ['es', 'cjs']
    },
    rollupOptions: {
      external: ['fs', '@seqtape/kernel', '@seqtape/dsp', '@seqtape/codec']
    }
  },
  plugins: [],
})
