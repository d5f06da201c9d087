/**
 * Registry error taxonomy.
 *
 * Every failed registry operation raises a RegistryError carrying a stable
 * code and the HTTP status the API layer answers with. State is never
 * modified by a failed operation.
 */

export type RegistryErrorCode =
  | 'INVALID_ARGUMENT'
  | 'DUPLICATE_REFERENCE'
  | 'NOT_FOUND'
  | 'NOT_OWNER'
  | 'ACCESS_DENIED'
  | 'UNAUTHENTICATED'
  | 'CORRUPT_STATE';

const STATUS_BY_CODE: Record<RegistryErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  DUPLICATE_REFERENCE: 409,
  NOT_FOUND: 404,
  NOT_OWNER: 403,
  ACCESS_DENIED: 403,
  UNAUTHENTICATED: 401,
  CORRUPT_STATE: 500,
};

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly statusCode: number;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}

export const RegistryErrors = {
  invalidArgument(message: string): RegistryError {
    return new RegistryError('INVALID_ARGUMENT', message);
  },

  duplicateReference(datasetRef: string): RegistryError {
    return new RegistryError('DUPLICATE_REFERENCE', `Dataset reference already registered: ${datasetRef}`);
  },

  notFound(id: number): RegistryError {
    return new RegistryError('NOT_FOUND', `Dataset not found: ${id}`);
  },

  notOwner(id: number): RegistryError {
    return new RegistryError('NOT_OWNER', `Only the owner may modify dataset ${id}`);
  },

  accessDenied(id: number): RegistryError {
    return new RegistryError('ACCESS_DENIED', `Dataset ${id} is private`);
  },

  unauthenticated(): RegistryError {
    return new RegistryError('UNAUTHENTICATED', 'No authenticated actor supplied');
  },

  corruptState(message: string): RegistryError {
    return new RegistryError('CORRUPT_STATE', `Persisted registry state is inconsistent: ${message}`);
  },
};
