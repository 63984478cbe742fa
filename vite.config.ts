/* eslint-disable @typescript-eslint/naming-convention */
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import pkg from './package.json'

const srcDir = fileURLToPath(new URL('./src', import.meta.url))

const external = [
  ...Object.keys(pkg.dependencies || {}).map((dep) => new RegExp(`^${dep}(/.*)?$`)),
  /d3-/,
]

// eslint-disable-next-line import/no-default-export
export default defineConfig(({ mode }) => {
  const isUMD = mode === 'umd'

  return {
    build: {
      outDir: 'dist',
      emptyOutDir: !isUMD,
      lib: {
        entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
        name: 'Mat3D',
        formats: [isUMD ? 'umd' : 'es'],
        fileName: () => (isUMD ? 'index.min.js' : 'index.js'),
      },
      sourcemap: true,
      minify: true,
      rollupOptions: {
        external: isUMD ? [] : external,
        ...(isUMD && {
          output: {
            globals: {
              'd3-ease': 'd3',
              'd3-interpolate': 'd3',
              'gl-matrix': 'glMatrix',
            },
          },
        }),
      },
    },
    plugins: isUMD ? [] : [dts({ entryRoot: 'src', exclude: ['**/__tests__/**'] })],
    resolve: {
      alias: {
        '@/mat3d': srcDir,
      },
    },
  }
})
