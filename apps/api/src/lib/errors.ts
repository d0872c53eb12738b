export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
};

const STATUS_CODE_MAP: Record<number, string> = {
  400: 'ERR_BAD_REQUEST',
  404: 'ERR_NOT_FOUND',
  405: 'ERR_METHOD_NOT_ALLOWED',
  413: 'ERR_PAYLOAD_TOO_LARGE',
  415: 'ERR_UNSUPPORTED_MEDIA_TYPE',
  429: 'ERR_RATE_LIMITED',
  500: 'ERR_INTERNAL',
  503: 'ERR_UNAVAILABLE',
};

export function errorResponse(
  message: string,
  code = 'ERR_REQUEST',
  details?: unknown
): ErrorEnvelope {
  return { error: { code, message, ...(details === undefined ? {} : { details }) } };
}

export function errorResponseForStatus(
  status: number,
  message: string,
  details?: unknown
): ErrorEnvelope {
  const code = STATUS_CODE_MAP[status] ?? 'ERR_REQUEST';
  return errorResponse(message, code, details);
}
