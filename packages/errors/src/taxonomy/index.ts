export { ErrorResponse } from "./error-response.js";
export { Interrupt } from "./interrupt.js";
export { InvocationError, type InvocationErrorInit } from "./invocation-error.js";
export { InvalidMessage, UnexpectedMessageError } from "./protocol.js";
export { AbortError, AuthError, ClientClosed, TransportError } from "./session.js";
