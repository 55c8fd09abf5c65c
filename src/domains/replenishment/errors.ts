export type InvalidParameterDetails = {
  field: string;
  message: string;
  value?: unknown;
};

export class InvalidParameterError extends Error {
  code = 'INVALID_PARAMETER' as const;
  status = 400;
  details: InvalidParameterDetails;

  constructor(field: string, message: string, value?: unknown) {
    super('INVALID_PARAMETER');
    this.name = 'InvalidParameterError';
    this.details = { field, message, value };
  }
}
