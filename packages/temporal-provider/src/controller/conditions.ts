export type Condition = {
  type: string
  status: 'True' | 'False' | 'Unknown'
  reason?: string
  message?: string
  lastTransitionTime: string
}

export type ConditionUpdate = Omit<Condition, 'lastTransitionTime'>

export const READY_CONDITION = 'Ready'

const defaultNowIso = () => new Date().toISOString()

const normalizeConditionUpdate = (update: ConditionUpdate) => ({
  ...update,
  reason: update.reason?.trim() || 'Reconciled',
  message: update.message ?? '',
})

export const upsertCondition = (
  conditions: Condition[],
  update: ConditionUpdate,
  nowIso: () => string = defaultNowIso,
): Condition[] => {
  const next = [...conditions]
  const normalized = normalizeConditionUpdate(update)
  const index = next.findIndex((cond) => cond.type === normalized.type)
  if (index === -1) {
    next.push({ ...normalized, lastTransitionTime: nowIso() })
    return next
  }
  const existing = next[index]
  if (
    existing.status !== normalized.status ||
    existing.reason !== normalized.reason ||
    existing.message !== normalized.message
  ) {
    next[index] = { ...existing, ...normalized, lastTransitionTime: nowIso() }
  }
  return next
}

export const available = (): ConditionUpdate => ({ type: READY_CONDITION, status: 'True', reason: 'Available' })
export const unavailable = (): ConditionUpdate => ({ type: READY_CONDITION, status: 'False', reason: 'Unavailable' })
export const creating = (): ConditionUpdate => ({ type: READY_CONDITION, status: 'False', reason: 'Creating' })
export const deleting = (): ConditionUpdate => ({ type: READY_CONDITION, status: 'False', reason: 'Deleting' })
