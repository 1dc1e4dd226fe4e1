export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class SessionNotFoundError extends HttpError {
  constructor(readonly sessionId: string) {
    super(404, `track session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}
