import { createHash } from 'node:crypto'

export const asRecord = (value: unknown): Record<string, unknown> | undefined => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return undefined
  const record: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value)) {
    record[key] = entry
  }
  return record
}

export const sha256Hex = (value: string | Uint8Array) => createHash('sha256').update(value).digest('hex')

export const canonicalizeForJson = (value: unknown): unknown => {
  if (value == null) return null
  if (Array.isArray(value)) return value.map((entry) => canonicalizeForJson(entry))
  if (typeof value !== 'object') return value

  const record = asRecord(value)
  if (!record) return value

  const output: Record<string, unknown> = {}
  for (const key of Object.keys(record).sort()) {
    const entry = record[key]
    if (entry === undefined) continue
    output[key] = canonicalizeForJson(entry)
  }
  return output
}

export const stableJsonStringify = (value: unknown) => JSON.stringify(canonicalizeForJson(value))

export const stableJsonEqual = (left: unknown, right: unknown) => stableJsonStringify(left) === stableJsonStringify(right)
