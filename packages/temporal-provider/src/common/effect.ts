import { Effect, Either } from 'effect'

/** Runs `effect` and rejects with its typed failure rather than a fiber failure wrapper. */
export const runOrThrow = async <A, E>(effect: Effect.Effect<A, E>): Promise<A> => {
  const result = await Effect.runPromise(Effect.either(effect))
  if (Either.isLeft(result)) {
    throw result.left
  }
  return result.right
}
