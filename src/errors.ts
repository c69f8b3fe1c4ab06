export interface ErrorOptions {
  cause?: unknown;
}

export class UpstreamServiceError extends Error {
  readonly service: string;

  constructor(service: string, message: string, options: ErrorOptions = {}) {
    super(message, options);
    this.name = 'UpstreamServiceError';
    this.service = service;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DatasetNotFoundError extends Error {
  readonly directory: string;

  constructor(directory: string) {
    super(`No daycare data file found in ${directory}`);
    this.name = 'DatasetNotFoundError';
    this.directory = directory;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Request body did not match the endpoint's JSON shape. */
export class InvalidInputError extends Error {
  readonly details: string[];

  constructor(details: string[]) {
    super('Invalid input');
    this.name = 'InvalidInputError';
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
