export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Unknown quality, sandbox escape, missing file and missing record all look the same to callers.
export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(message, 404);
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class EncodingError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr = "",
  ) {
    super(message);
    this.name = "EncodingError";
  }
}
