// Quote source: service definition and transport errors.

import { Context, Data, Effect } from "effect";
import type { RawQuote } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export type QuoteSourceError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError;

// --- Service ---

export class QuoteSource extends Context.Tag("QuoteSource")<
  QuoteSource,
  {
    readonly getRawQuote: (
      symbol: string,
    ) => Effect.Effect<RawQuote, QuoteSourceError>;
  }
>() {}
