export type ErrorKind =
  | "IllegalCharacter"
  | "UnexpectedToken"
  | "UnboundOperator"
  | "Unsupported"
  | "BackendFailure";

/**Error raised by any stage of the pipeline */
export class RpnError extends Error {
  constructor(
    public readonly from: string,
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(`${from}: ${message}`);
    this.name = kind;
  }
}

export const err = (from: string, kind: ErrorKind, msg: string): never => {
  throw new RpnError(from, kind, msg);
};
