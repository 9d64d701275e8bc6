import type { URI } from "@wampkit/core";
import type { ErrorMessage } from "@wampkit/protocol";
import { WampError } from "../base.js";
import { type ErrorCatalogEntry, getCatalogEntry } from "../catalog.js";
import { joinArgs, joinKwargs, reprValue } from "../format.js";

function renderErrorMessage(message: ErrorMessage): string {
  let rendered: string = message.error;

  const args = joinArgs(message.args, reprValue);
  if (args) {
    rendered += ` ${args}`;
  }

  const kwargs = joinKwargs(message.kwargs);
  if (kwargs) {
    rendered += ` (${kwargs})`;
  }

  return rendered;
}

/**
 * Remote error whose URI has no registered factory.
 * Wraps the ERROR message unchanged.
 */
export class ErrorResponse extends WampError {
  readonly _tag = "ErrorResponse" as const;

  constructor(public readonly response: ErrorMessage) {
    super(renderErrorMessage(response));
  }

  get uri(): URI {
    return this.response.error;
  }

  /** Catalog entry when the URI is one of the predefined WAMP errors */
  get wellKnown(): ErrorCatalogEntry | undefined {
    return getCatalogEntry(this.response.error);
  }

  override toString(): string {
    return this.message;
  }

  override toJSON() {
    return {
      ...super.toJSON(),
      uri: this.response.error,
      args: this.response.args,
      kwargs: this.response.kwargs,
      details: this.response.details,
    };
  }
}
