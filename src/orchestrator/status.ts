import type { ErrorKind } from '../types/index.js';

export function httpStatusFor(kind: ErrorKind): number {
  switch (kind) {
    case 'InvalidRequest':
    case 'EmptyInput':
      return 400;
    case 'InputTooLong':
      return 413;
    case 'Cancelled':
      // Client closed the connection; nginx convention
      return 499;
    case 'Timeout':
    case 'RateLimited':
    case 'ServiceUnavailable':
    case 'UpstreamExhausted':
      return 503;
    case 'Unauthorized':
    case 'MalformedUpstreamResponse':
    case 'InvalidCategory':
    case 'InvalidSeverity':
    case 'InvalidTag':
    case 'UnknownUpstreamError':
      return 502;
  }
}
