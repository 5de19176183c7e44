export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export class DigestError extends Error {
  constructor(message: string, public path: string, public cause?: unknown) {
    super(message);
    this.name = 'DigestError';
  }
}
