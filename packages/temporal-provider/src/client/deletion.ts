/**
 * Outcome of deleting a namespace. Only `deleted` means the server accepted a delete;
 * the other kinds are the permissive outcomes a reconciler treats as already gone.
 */
export type NamespaceDeletion =
  | { readonly kind: 'deleted'; readonly name: string; readonly deletedNamespace: string }
  | { readonly kind: 'absent' | 'not-found' | 'invalid-state'; readonly name: string }

export const NamespaceDeletion = {
  deleted: (name: string, deletedNamespace: string): NamespaceDeletion => ({ kind: 'deleted', name, deletedNamespace }),
  absent: (name: string): NamespaceDeletion => ({ kind: 'absent', name }),
  notFound: (name: string): NamespaceDeletion => ({ kind: 'not-found', name }),
  invalidState: (name: string): NamespaceDeletion => ({ kind: 'invalid-state', name }),
} as const
