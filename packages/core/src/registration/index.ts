export { RegistrationWorkflow } from './registration-workflow.js';
export type {
  RegistrationDeps,
  RegistrationSettings,
  PendingAccount,
  SignedIn,
  RegisterError,
  ConfirmError,
  LoginError,
} from './registration-workflow.js';
export { generateConfirmationCode, CONFIRMATION_CODE_LENGTH } from './confirmation-code.js';
export { registrationSchema, loginSchema, toFieldErrors, USERNAME_PATTERN } from './schemas.js';
export type { RegistrationInput, LoginInput } from './schemas.js';
