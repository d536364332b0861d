import { ok, err, type Result } from 'neverthrow';
import type { Account } from '../types/account.js';
import {
  InvalidCredentialsError,
  InvalidTokenError,
  StoreError,
  ValidationError,
  type FieldErrors,
} from '../types/errors.js';
import type { AccountRepository, ConfirmationRepository } from '../storage/types.js';
import type { PasswordHasher } from '../auth/password.js';
import type { OpenedSession, SessionService } from '../auth/session-service.js';
import type { PresenceTracker } from '../presence/presence-tracker.js';
import type { MailDispatcher } from '../mail/types.js';
import { generateConfirmationCode } from './confirmation-code.js';
import { loginSchema, registrationSchema, toFieldErrors } from './schemas.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegistrationSettings {
  readonly passwordMinLength: number;
  /** Unconfirmed accounts are refused at login when set. */
  readonly requireConfirmedLogin: boolean;
  readonly failDelayMs: number;
}

export interface RegistrationDeps {
  readonly accounts: AccountRepository;
  readonly confirmations: ConfirmationRepository;
  readonly sessions: SessionService;
  readonly presence: PresenceTracker;
  readonly hasher: PasswordHasher;
  readonly mail: MailDispatcher;
  readonly settings: RegistrationSettings;
  readonly generateCode?: () => string;
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface PendingAccount {
  readonly id: number;
  readonly username: string;
  readonly email: string;
}

export interface SignedIn {
  readonly account: Account;
  readonly session: OpenedSession;
}

export type RegisterError = ValidationError | StoreError;
export type ConfirmError = InvalidTokenError | StoreError;
export type LoginError = ValidationError | InvalidCredentialsError | StoreError;

const USERNAME_TAKEN = 'Username is already taken';
const EMAIL_TAKEN = 'Email is already registered';
const CODE_ATTEMPTS = 3;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// RegistrationWorkflow
// ---------------------------------------------------------------------------

/**
 * Submitted -> PendingConfirmation -> Confirmed, plus login and logout.
 *
 * Confirmation codes are single use: consumption is delegated to the store,
 * which deletes the code and activates the account in one atomic step.
 */
export class RegistrationWorkflow {
  private readonly generateCode: () => string;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: RegistrationDeps) {
    this.generateCode = deps.generateCode ?? (() => generateConfirmationCode());
    this.sleep = deps.sleep ?? sleep;
  }

  async register(input: unknown): Promise<Result<PendingAccount, RegisterError>> {
    const parsed = registrationSchema(this.deps.settings.passwordMinLength).safeParse(input);
    if (!parsed.success) {
      return err(new ValidationError(toFieldErrors(parsed.error)));
    }
    const { username, email, password } = parsed.data;

    const taken = await this.findTakenFields(username, email);
    if (taken.isErr()) return err(taken.error);
    if (Object.keys(taken.value).length > 0) {
      return err(new ValidationError(taken.value));
    }

    const passwordHash = await this.deps.hasher.hash(password);

    let code = this.generateCode();
    let created = await this.deps.accounts.createPending({ username, email, passwordHash }, code);
    for (let attempt = 1; attempt < CODE_ATTEMPTS && isCodeCollision(created); attempt++) {
      code = this.generateCode();
      created = await this.deps.accounts.createPending({ username, email, passwordHash }, code);
    }

    if (created.isErr()) {
      const conflict = conflictToValidation(created.error);
      return err(conflict ?? created.error);
    }

    const account = created.value;
    this.deps.mail.enqueue('registration', account.email, { username: account.username, code });

    return ok({ id: account.id, username: account.username, email: account.email });
  }

  async confirm(code: string): Promise<Result<SignedIn, ConfirmError>> {
    if (code.length === 0) {
      return err(new InvalidTokenError());
    }

    const consumed = await this.deps.confirmations.consume(code);
    if (consumed.isErr()) return err(consumed.error);
    if (!consumed.value) return err(new InvalidTokenError());

    return this.signIn(consumed.value, false);
  }

  async login(input: unknown): Promise<Result<SignedIn, LoginError>> {
    const parsed = loginSchema.safeParse(input);
    if (!parsed.success) {
      return err(new ValidationError(toFieldErrors(parsed.error)));
    }
    const { email, password, remember } = parsed.data;

    const found = await this.deps.accounts.findByEmail(email);
    if (found.isErr()) return err(found.error);

    const account = found.value;
    const accepted = account
      ? await this.acceptsLogin(account, password)
      : await this.deps.hasher.verifyAbsent(password);
    if (!account || !accepted) {
      if (this.deps.settings.failDelayMs > 0) {
        await this.sleep(this.deps.settings.failDelayMs);
      }
      return err(new InvalidCredentialsError());
    }

    return this.signIn(account, remember);
  }

  /** Idempotent: unknown or absent tokens are fine. */
  async logout(token: string | null | undefined): Promise<Result<void, StoreError>> {
    if (!token) return ok(undefined);
    return this.deps.sessions.close(token);
  }

  private async signIn(account: Account, persistent: boolean): Promise<Result<SignedIn, StoreError>> {
    const session = await this.deps.sessions.open(account.id, { persistent });
    if (session.isErr()) return err(session.error);

    const touched = await this.deps.presence.touchLogin(account.id);
    if (touched.isErr()) return err(touched.error);

    return ok({
      account: { ...account, lastLoginAt: touched.value, lastActivityAt: touched.value },
      session: session.value,
    });
  }

  private async acceptsLogin(account: Account, password: string): Promise<boolean> {
    if (!(await this.deps.hasher.verify(password, account.passwordHash))) return false;
    return account.isConfirmed || !this.deps.settings.requireConfirmedLogin;
  }

  private async findTakenFields(username: string, email: string): Promise<Result<FieldErrors, StoreError>> {
    const byUsername = await this.deps.accounts.findByUsername(username);
    if (byUsername.isErr()) return err(byUsername.error);
    const byEmail = await this.deps.accounts.findByEmail(email);
    if (byEmail.isErr()) return err(byEmail.error);

    const fields: Record<string, string[]> = {};
    if (byUsername.value) fields['username'] = [USERNAME_TAKEN];
    if (byEmail.value) fields['email'] = [EMAIL_TAKEN];
    return ok(fields);
  }
}

function isCodeCollision(result: Result<Account, StoreError>): boolean {
  return result.isErr() && result.error.kind === 'conflict' && result.error.field === 'code';
}

/** A uniqueness race lost inside the store reads the same as the pre-check. */
function conflictToValidation(error: StoreError): ValidationError | null {
  if (error.kind !== 'conflict') return null;
  if (error.field === 'username') return new ValidationError({ username: [USERNAME_TAKEN] });
  if (error.field === 'email') return new ValidationError({ email: [EMAIL_TAKEN] });
  return null;
}
