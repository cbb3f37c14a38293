import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { OutputSink } from './types.js'

export function createFileSink(root: string): OutputSink {
  const resolve = (relativePath: string) => path.join(root, relativePath)
  return {
    root,
    ensureDir: async (relativePath) => {
      await fs.mkdir(resolve(relativePath), { recursive: true })
    },
    writeText: async (relativePath, content) => {
      const target = resolve(relativePath)
      await fs.mkdir(path.dirname(target), { recursive: true })
      await fs.writeFile(target, content, 'utf8')
    },
  }
}
