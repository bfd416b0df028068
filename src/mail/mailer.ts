import type { Logger } from '../logging/logger.js';
import { tokenFingerprint } from '../crypto/hash.js';

/**
 * Outbound account email. Delivery is up to the implementation.
 */
export interface IMailer {
  sendVerificationEmail(to: string, username: string, token: string): Promise<void>;
  sendPasswordResetEmail(to: string, username: string, token: string): Promise<void>;
  sendPasswordChangedEmail(to: string, username: string): Promise<void>;
}

export interface LogMailerOptions {
  logger: Logger;
  frontendUrl: string;
  /**
   * Include the full link at debug level (development only)
   */
  exposeLinks?: boolean;
}

/**
 * Mailer that only logs what would be sent
 */
export class LogMailer implements IMailer {
  constructor(private readonly options: LogMailerOptions) {}

  async sendVerificationEmail(to: string, username: string, token: string): Promise<void> {
    this.logLink('verification', to, username, `/verify-email?token=${token}`, token);
  }

  async sendPasswordResetEmail(to: string, username: string, token: string): Promise<void> {
    this.logLink('password_reset', to, username, `/reset-password?token=${token}`, token);
  }

  async sendPasswordChangedEmail(to: string, username: string): Promise<void> {
    this.options.logger.info('Email queued', { kind: 'password_changed', to, username });
  }

  private logLink(kind: string, to: string, username: string, path: string, token: string): void {
    const { logger, frontendUrl, exposeLinks } = this.options;
    logger.info('Email queued', {
      kind,
      to,
      username,
      path: path.split('?')[0],
      token: tokenFingerprint(token),
    });
    if (exposeLinks) {
      logger.debug('Email link', { kind, to, link: `${frontendUrl}${path}` });
    }
  }
}
