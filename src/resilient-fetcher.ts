// Resilient fetcher: bounded attempts with a constant backoff.
//
// Every attempt gets its own timeout. Failures are retried after a fixed
// delay until the attempt budget is spent; whatever happens, the caller
// only ever sees a quote or none.

import { Effect, Option, Schedule } from "effect";
import type { RawQuote } from "./domain.ts";
import { describeFailure } from "./format.ts";
import {
  NetworkError,
  QuoteSource,
  type QuoteSourceError,
} from "./quote-source.ts";
import { defaultFetchPolicy, type FetchPolicy } from "./settings.ts";

/** A missing symbol will still be missing on the next attempt, and an
 *  error the service reported in a well-formed response will be repeated.
 *  Everything else may be transient. */
export function isRetryable(e: QuoteSourceError): boolean {
  return e._tag !== "SymbolNotFound" && e._tag !== "ServiceError";
}

export function retrySchedule(policy: FetchPolicy) {
  return Schedule.spaced(policy.retryDelay).pipe(
    Schedule.compose(Schedule.recurs(Math.max(0, policy.maxAttempts - 1))),
  );
}

export function fetchRawQuote(
  symbol: string,
  policy: FetchPolicy = defaultFetchPolicy,
): Effect.Effect<Option.Option<RawQuote>, never, QuoteSource> {
  return Effect.gen(function* () {
    const source = yield* QuoteSource;

    const attempt = source.getRawQuote(symbol).pipe(
      Effect.timeoutFail({
        duration: policy.attemptTimeout,
        onTimeout: () =>
          new NetworkError({ message: `${symbol}: request timed out` }),
      }),
      Effect.tapError((e) =>
        Effect.logDebug(`[fetch] ${symbol} attempt failed: ${describeFailure(e)}`),
      ),
    );

    return yield* attempt.pipe(
      Effect.retry({ while: isRetryable, schedule: retrySchedule(policy) }),
      Effect.option,
      Effect.catchAllDefect((defect) =>
        Effect.logDebug(`[fetch] ${symbol} defect: ${String(defect)}`).pipe(
          Effect.as(Option.none<RawQuote>()),
        ),
      ),
    );
  });
}
