/**
 * Single-fire completion callbacks
 *
 * Every provider operation reports through a Completion exactly once.
 */

import type { ModelStoreError } from "./errors.js";
import { logger, describeError } from "./observability/logs.js";

export type Outcome<T> = { success: true; value: T } | { success: false; error: ModelStoreError };

export type Completion<T> = (outcome: Outcome<T>) => void;

export function succeed<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail<T>(error: ModelStoreError): Outcome<T> {
  return { success: false, error };
}

/**
 * Wrap a completion so it fires at most once.
 *
 * Later deliveries are dropped with a warning. An exception thrown by the callback is
 * logged and not rethrown, so it can never reach the document store's promise chain
 * and be reported a second time as a storage failure.
 */
export function once<T>(onDone: Completion<T>, label = "completion"): Completion<T> {
  let fired = false;
  return (outcome) => {
    if (fired) {
      logger.warn("completion.duplicate", {
        modelId: outcome.success ? undefined : outcome.error.modelId,
        message: `${label} delivered more than once; dropping`,
      });
      return;
    }
    fired = true;
    try {
      onDone(outcome);
    } catch (err) {
      logger.error("completion.threw", { message: `${label} callback threw: ${describeError(err)}` });
    }
  };
}

/**
 * Run a callback style operation as a promise that rejects with the classified error
 */
export function toPromise<T>(run: (onDone: Completion<T>) => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    run((outcome) => {
      if (outcome.success) {
        resolve(outcome.value);
      } else {
        reject(outcome.error);
      }
    });
  });
}
