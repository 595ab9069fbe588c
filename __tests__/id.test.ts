/**
 * Unit tests for record name generation, src/id.ts
 */
import { generateRecordName } from '../src/id.js'
import { isValidKubernetesName } from '../src/state-resolver.js'

describe('id.ts', () => {
  it('should combine the prefix, unix seconds and a hex suffix', () => {
    const name = generateRecordName(
      'chronicle-history',
      new Date('2026-10-19T08:30:00.999Z')
    )

    expect(name).toMatch(/^chronicle-history-1792398600-[0-9a-f]{6}$/)
    expect(isValidKubernetesName(name)).toBe(true)
  })

  it('should keep names generated within the same second apart', () => {
    const now = new Date('2026-10-19T08:30:00Z')
    const names = new Set(
      Array.from({ length: 20 }, () => generateRecordName('delete', now))
    )

    expect(names.size).toBe(20)
  })
})
