/** Connection failure, malformed HTTP, or an empty reply. */
export class RpcTransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RpcTransportError";
  }
}

export class RpcTimeoutError extends RpcTransportError {
  constructor(message: string) {
    super(message);
    this.name = "RpcTimeoutError";
  }
}

export class RpcAuthError extends Error {
  constructor(message = "Authentication failed: check your RPC credentials") {
    super(message);
    this.name = "RpcAuthError";
  }
}

export class RpcHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = "RpcHttpError";
  }
}

/** The HTTP body was not a JSON-RPC envelope. */
export class RpcProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RpcProtocolError";
  }
}

/** Error reported by the daemon inside the envelope. */
export class RpcError extends Error {
  constructor(
    message: string,
    public readonly code: number,
  ) {
    super(message);
    this.name = "RpcError";
  }
}

export class CookieError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CookieError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
