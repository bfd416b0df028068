import type { IStorage } from '../storage/interfaces/index.js';
import type { User } from '../types/user.js';
import { passwordHashOf, withPasswordHash } from '../types/user.js';
import type { Logger } from '../logging/logger.js';
import type { IMailer } from '../mail/mailer.js';
import { ApiError } from '../errors/api-error.js';
import type { CredentialService } from './credential-service.js';
import type { AccessTokenService } from './access-token-service.js';
import type {
  RefreshSessionService,
  RefreshSessionMetadata,
  IssuedRefreshSession,
  SessionSummary,
} from './refresh-session-service.js';
import type { ActionTokenService } from './action-token-service.js';

export const MESSAGE_INVALID_CREDENTIALS = 'Invalid email or password';
export const MESSAGE_EMAIL_NOT_VERIFIED = 'Email verification required. Please verify your email.';
export const MESSAGE_INVALID_RESET_TOKEN = 'Invalid or expired reset token';

export interface AccountServiceOptions {
  storage: IStorage;
  credentials: CredentialService;
  accessTokens: AccessTokenService;
  refreshSessions: RefreshSessionService;
  actionTokens: ActionTokenService;
  mailer: IMailer;
  logger: Logger;
}

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
}

/**
 * A freshly minted access token and refresh session
 */
export interface SessionGrant {
  user: User;
  accessToken: string;
  refresh: IssuedRefreshSession;
}

/**
 * Password account lifecycle: registration, login, refresh, verification and reset
 */
export class AccountService {
  private readonly storage: IStorage;
  private readonly credentials: CredentialService;
  private readonly accessTokens: AccessTokenService;
  private readonly refreshSessions: RefreshSessionService;
  private readonly actionTokens: ActionTokenService;
  private readonly mailer: IMailer;
  private readonly logger: Logger;

  constructor(options: AccountServiceOptions) {
    this.storage = options.storage;
    this.credentials = options.credentials;
    this.accessTokens = options.accessTokens;
    this.refreshSessions = options.refreshSessions;
    this.actionTokens = options.actionTokens;
    this.mailer = options.mailer;
    this.logger = options.logger;
  }

  /**
   * Create an unverified password account and mail a verification link.
   * Never reports whether the email or username was taken.
   */
  async register(input: RegisterInput): Promise<void> {
    try {
      const passwordHash = await this.credentials.hash(input.password);

      const created = await this.storage.transaction(async (tx) => {
        const result = await tx.users.create({
          username: input.username,
          email: input.email,
          credentials: { kind: 'password', passwordHash },
          emailVerified: false,
        });
        if (result.status === 'conflict') {
          this.logger.info('Registration rejected', { reason: `${result.field}_taken` });
          return null;
        }

        const token = await this.actionTokens.issue(result.user.id, 'email_verification', tx);
        return { user: result.user, token };
      });

      if (created) {
        this.logger.info('User registered', { userId: created.user.id });
        await this.sendMail('verification', () =>
          this.mailer.sendVerificationEmail(created.user.email, created.user.username, created.token)
        );
      }
    } catch (err) {
      this.logger.error('Registration failed', { error: err });
    }
  }

  async login(email: string, password: string, metadata: RefreshSessionMetadata): Promise<SessionGrant> {
    const user = await this.storage.users.findByEmail(email);
    const passwordHash = user ? passwordHashOf(user.credentials) : undefined;

    if (!user || !passwordHash) {
      await this.credentials.verifyAgainstDummy(password);
      throw ApiError.authFailure(MESSAGE_INVALID_CREDENTIALS);
    }

    if (!(await this.credentials.verify(password, passwordHash))) {
      throw ApiError.authFailure(MESSAGE_INVALID_CREDENTIALS);
    }

    if (!user.emailVerified) {
      throw ApiError.authFailure(MESSAGE_EMAIL_NOT_VERIFIED);
    }

    return this.grantSession(user, metadata);
  }

  /**
   * Mint an access token and a new refresh session for a signed-in user
   */
  async grantSession(user: User, metadata: RefreshSessionMetadata): Promise<SessionGrant> {
    const accessToken = await this.accessTokens.mint(user.id, user.email);
    const refresh = await this.refreshSessions.issue(user.id, metadata);
    return { user, accessToken, refresh };
  }

  async refresh(secret: string): Promise<SessionGrant> {
    const refresh = await this.refreshSessions.rotate(secret);

    const user = await this.storage.users.findById(refresh.userId);
    if (!user || !user.emailVerified) {
      await this.refreshSessions.revoke(refresh.secret);
      throw ApiError.authFailure(user ? MESSAGE_EMAIL_NOT_VERIFIED : 'Invalid refresh token');
    }

    const accessToken = await this.accessTokens.mint(user.id, user.email);
    return { user, accessToken, refresh };
  }

  /**
   * Revoke the presented refresh session. Failures are logged, never raised.
   */
  async logout(secret: string | undefined): Promise<void> {
    if (!secret) {
      return;
    }
    try {
      await this.refreshSessions.revoke(secret);
    } catch (err) {
      this.logger.error('Failed to revoke refresh token on logout', { error: err });
    }
  }

  async logoutAll(userId: string): Promise<number> {
    const revoked = await this.refreshSessions.revokeAll(userId);
    this.logger.info('Revoked all sessions', { userId, revoked });
    return revoked;
  }

  async listSessions(userId: string): Promise<SessionSummary[]> {
    return this.refreshSessions.listSessions(userId);
  }

  async getUser(userId: string): Promise<User> {
    const user = await this.storage.users.findById(userId);
    if (!user) {
      throw ApiError.notFound('User not found');
    }
    return user;
  }

  /**
   * Mail a reset link to password accounts. Silent in every other case.
   */
  async requestPasswordReset(email: string): Promise<void> {
    try {
      const user = await this.storage.users.findByEmail(email);
      if (!user || !passwordHashOf(user.credentials)) {
        this.logger.info('Password reset requested for ineligible email');
        return;
      }

      const token = await this.actionTokens.issue(user.id, 'password_reset');
      await this.sendMail('password_reset', () =>
        this.mailer.sendPasswordResetEmail(user.email, user.username, token)
      );
    } catch (err) {
      this.logger.error('Password reset request failed', { error: err });
    }
  }

  /**
   * Consume a reset token, replace the password and end every session, atomically
   */
  async resetPassword(token: string, newPassword: string): Promise<void> {
    const passwordHash = await this.credentials.hash(newPassword);

    const user = await this.storage.transaction(async (tx) => {
      const userId = await this.actionTokens.consume(token, 'password_reset', tx);
      if (!userId) {
        throw ApiError.authFailure(MESSAGE_INVALID_RESET_TOKEN);
      }

      const existing = await tx.users.findById(userId);
      if (!existing) {
        throw ApiError.authFailure(MESSAGE_INVALID_RESET_TOKEN);
      }

      const updated = await tx.users.update(userId, {
        credentials: withPasswordHash(existing.credentials, passwordHash),
      });
      if (updated.status !== 'updated') {
        throw ApiError.authFailure(MESSAGE_INVALID_RESET_TOKEN);
      }

      await this.refreshSessions.revokeAll(userId, tx);
      return updated.user;
    });

    this.logger.info('Password reset', { userId: user.id });
    await this.sendMail('password_changed', () =>
      this.mailer.sendPasswordChangedEmail(user.email, user.username)
    );
  }

  /**
   * Mail a fresh verification link to unverified accounts. Silent otherwise.
   */
  async resendVerification(email: string): Promise<void> {
    try {
      const user = await this.storage.users.findByEmail(email);
      if (!user || user.emailVerified) {
        this.logger.info('Verification resend requested for ineligible email');
        return;
      }

      const token = await this.actionTokens.issue(user.id, 'email_verification');
      await this.sendMail('verification', () =>
        this.mailer.sendVerificationEmail(user.email, user.username, token)
      );
    } catch (err) {
      this.logger.error('Verification resend failed', { error: err });
    }
  }

  /**
   * Returns true only when this call verified the address
   */
  async verifyEmail(token: string): Promise<boolean> {
    try {
      return await this.storage.transaction(async (tx) => {
        const userId = await this.actionTokens.consume(token, 'email_verification', tx);
        if (!userId) {
          return false;
        }

        const user = await tx.users.findById(userId);
        if (!user || user.emailVerified) {
          return false;
        }

        const updated = await tx.users.update(userId, { emailVerified: true });
        if (updated.status === 'updated') {
          this.logger.info('Email verified', { userId });
          return true;
        }
        return false;
      });
    } catch (err) {
      this.logger.error('Email verification failed', { error: err });
      return false;
    }
  }

  /**
   * Replace the password of a signed-in user and end every session
   */
  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.storage.users.findById(userId);
    const passwordHash = user ? passwordHashOf(user.credentials) : undefined;

    if (!user || !passwordHash) {
      await this.credentials.verifyAgainstDummy(currentPassword);
      throw ApiError.authFailure(MESSAGE_INVALID_CREDENTIALS);
    }
    if (!(await this.credentials.verify(currentPassword, passwordHash))) {
      throw ApiError.authFailure('Current password is incorrect');
    }

    const nextHash = await this.credentials.hash(newPassword);

    await this.storage.transaction(async (tx) => {
      const updated = await tx.users.update(userId, {
        credentials: withPasswordHash(user.credentials, nextHash),
      });
      if (updated.status !== 'updated') {
        throw ApiError.notFound('User not found');
      }
      await this.refreshSessions.revokeAll(userId, tx);
    });

    this.logger.info('Password changed', { userId });
    await this.sendMail('password_changed', () =>
      this.mailer.sendPasswordChangedEmail(user.email, user.username)
    );
  }

  async updateUsername(userId: string, username: string): Promise<User> {
    const result = await this.storage.users.update(userId, { username });
    switch (result.status) {
      case 'updated':
        return result.user;
      case 'conflict':
        throw ApiError.conflict('Username already in use');
      case 'not_found':
        throw ApiError.notFound('User not found');
    }
  }

  async deleteAccount(userId: string): Promise<void> {
    if (!(await this.storage.users.delete(userId))) {
      throw ApiError.notFound('User not found');
    }
    this.logger.info('Account deleted', { userId });
  }

  private async sendMail(kind: string, send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (err) {
      this.logger.error('Failed to send email', { kind, error: err });
    }
  }
}
