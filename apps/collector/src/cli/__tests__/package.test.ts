import { describe, it, expect } from 'vitest'
import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { isRecord } from '../../collection/utils/fields.js'

const packageDir = fileURLToPath(new URL('../../../', import.meta.url))

function packageJson(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(join(packageDir, 'package.json'), 'utf8'))
  if (!isRecord(parsed)) throw new Error('package.json is not an object')
  return parsed
}

describe('collector package', () => {
  it('runs the CLI from its TypeScript entry point', () => {
    const manifest = packageJson()
    const scripts = isRecord(manifest.scripts) ? manifest.scripts : {}

    expect(scripts.collect).toBe('tsx src/cli/index.ts')
    expect(existsSync(join(packageDir, 'src', 'cli', 'index.ts'))).toBe(true)
  })

  it('publishes no bin pointing at build output', () => {
    expect(packageJson().bin).toBeUndefined()
  })
})
