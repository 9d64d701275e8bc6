import { asUri, type URI, type WampDict, type WampList, type WampValue } from "@wampkit/core";
import { WampError } from "../base.js";
import { displayValue, joinArgs, reprValue } from "../format.js";

/** Payload of an InvocationError; empty containers are treated as absent */
export interface InvocationErrorInit {
  readonly args?: WampList | undefined;
  readonly kwargs?: WampDict | undefined;
  readonly details?: WampDict | undefined;
  readonly cause?: unknown;
}

function nonEmptyList(list: WampList | undefined): WampList | undefined {
  return list !== undefined && list.length > 0 ? [...list] : undefined;
}

function nonEmptyDict(dict: WampDict | undefined): WampDict | undefined {
  return dict !== undefined && Object.keys(dict).length > 0 ? { ...dict } : undefined;
}

/**
 * A failure to be reported back to the caller of a procedure as an ERROR
 * message.
 *
 * `args`, `kwargs` and `details` are `undefined` rather than empty when not
 * supplied, so the wire encoding can leave them out.
 *
 * @example
 * ```typescript
 * throw new InvocationError("com.example.bad_arg", { args: [1, 2], kwargs: { x: 3 } });
 * // or, positional arguments only
 * throw InvocationError.of("com.example.bad_arg", 1, 2);
 * ```
 */
export class InvocationError extends WampError {
  readonly _tag = "InvocationError" as const;

  private _uri: URI;
  private _args: WampList | undefined;
  private _kwargs: WampDict | undefined;
  private _details: WampDict | undefined;

  /**
   * @throws {InvalidUriError} If `uri` is not a valid URI
   */
  constructor(uri: string, init: InvocationErrorInit = {}) {
    const validated = asUri(uri);
    const args = nonEmptyList(init.args);
    super(InvocationError.render(validated, args), init.cause !== undefined ? { cause: init.cause } : undefined);
    this._uri = validated;
    this._args = args;
    this._kwargs = nonEmptyDict(init.kwargs);
    this._details = nonEmptyDict(init.details);
  }

  /** Build an InvocationError from positional arguments only */
  static of(uri: string, ...args: WampValue[]): InvocationError {
    return new InvocationError(uri, { args });
  }

  get uri(): URI {
    return this._uri;
  }

  get args(): WampList | undefined {
    return this._args;
  }

  get kwargs(): WampDict | undefined {
    return this._kwargs;
  }

  get details(): WampDict | undefined {
    return this._details;
  }

  /**
   * Replace every field with the fields of `other`, keeping this instance.
   * Used when error metadata is attached to a failure that already is an
   * InvocationError.
   */
  overwriteWith(other: InvocationError): void {
    this._uri = other.uri;
    this._args = other.args;
    this._kwargs = other.kwargs;
    this._details = other.details;
    this.message = InvocationError.render(other.uri, other.args);
  }

  /** `<uri> <args...>`; kwargs and details are not part of the display form */
  override toString(): string {
    return this.message;
  }

  /**
   * Detailed form including kwargs and details, for debugging:
   * `InvocationError("<uri>", <args...>, kwargs=<json>, details=<json>)`
   */
  describe(): string {
    const parts = [reprValue(this._uri)];
    if (this._args) {
      parts.push(joinArgs(this._args, reprValue));
    }
    if (this._kwargs) {
      parts.push(`kwargs=${JSON.stringify(this._kwargs)}`);
    }
    if (this._details) {
      parts.push(`details=${JSON.stringify(this._details)}`);
    }
    return `${this.name}(${parts.join(", ")})`;
  }

  override toJSON() {
    return {
      ...super.toJSON(),
      uri: this._uri,
      args: this._args,
      kwargs: this._kwargs,
      details: this._details,
    };
  }

  private static render(uri: URI, args: WampList | undefined): string {
    return args ? `${uri} ${joinArgs(args, displayValue)}` : uri;
  }
}
