export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  SignalError,
  SignalRegistrationError,
  SourceMapLoadFailedError,
  UnknownSignalError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
