import nodemailer, { Transporter } from 'nodemailer';
import { EmailChannelConfig } from '../../common/interfaces/monitor.interfaces';
import { Notifier, NotifierOptions, RenderedAlert } from '../../common/interfaces/notifier.interface';
import { NotifierError, errorCode, errorMessage } from '../../common/errors';

const UNREACHABLE_CODES = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS']);

function toNotifierError(server: string, error: unknown): NotifierError {
  const code = errorCode(error);
  if (code === 'EAUTH') {
    return new NotifierError('AuthFailed', `SMTP server ${server} rejected the credentials: ${errorMessage(error)}`);
  }
  if (code !== undefined && UNREACHABLE_CODES.has(code)) {
    return new NotifierError('Unreachable', `SMTP server ${server} is unreachable: ${errorMessage(error)}`);
  }
  return new NotifierError('InvalidResponse', `SMTP server ${server} refused the message: ${errorMessage(error)}`);
}

/**
 * Sends alerts over SMTP. Port 465 uses implicit TLS, every other port
 * upgrades with STARTTLS.
 */
export class EmailNotifier implements Notifier {
  readonly channel = 'email' as const;
  private transporter: Transporter | null = null;

  constructor(
    private readonly settings: EmailChannelConfig,
    private readonly options: NotifierOptions,
  ) {}

  private getTransporter(): Transporter {
    if (!this.transporter) {
      const secure = this.settings.smtpPort === 465;
      this.transporter = nodemailer.createTransport({
        host: this.settings.smtpServer,
        port: this.settings.smtpPort,
        secure,
        requireTLS: !secure,
        auth: this.settings.smtpUser
          ? { user: this.settings.smtpUser, pass: this.settings.smtpPassword }
          : undefined,
        connectionTimeout: this.options.deliveryTimeoutMs,
        greetingTimeout: this.options.deliveryTimeoutMs,
        socketTimeout: this.options.deliveryTimeoutMs,
      });
    }
    return this.transporter;
  }

  async send(alert: RenderedAlert): Promise<void> {
    const server = `${this.settings.smtpServer}:${this.settings.smtpPort}`;
    try {
      await this.getTransporter().sendMail({
        from: this.settings.fromEmail,
        to: this.settings.toEmail.join(', '),
        subject: this.settings.subject,
        text: alert.message,
      });
    } catch (error) {
      throw toNotifierError(server, error);
    }
  }
}
