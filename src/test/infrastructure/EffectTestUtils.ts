/**
 * Effect Test Utilities
 * Helpers for running Effects in tests and reading their outcome
 */

import { Cause, Effect, Exit, Option } from 'effect';

/**
 * Run an Effect and get the Exit result
 */
export const runForExit = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<Exit.Exit<A, E>> => Effect.runPromiseExit(effect);

/**
 * Assert that an Effect succeeds
 */
export const expectSuccess = async <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<A> => {
  const exit = await runForExit(effect);
  if (Exit.isFailure(exit)) {
    throw new Error(
      `Expected success but got failure: ${Cause.pretty(exit.cause)}`
    );
  }
  return exit.value;
};

/**
 * Assert that an Effect fails, returning the typed error
 */
export const expectFailure = async <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<E> => {
  const exit = await runForExit(effect);
  if (Exit.isSuccess(exit)) {
    throw new Error(
      `Expected failure but got success: ${JSON.stringify(exit.value)}`
    );
  }
  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    return failure.value;
  }
  throw new Error(`Unexpected failure cause: ${Cause.pretty(exit.cause)}`);
};
