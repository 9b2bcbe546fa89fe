import chalk from 'chalk';
import { Severity } from '../../common/interfaces/monitor.interfaces';
import { Notifier, RenderedAlert } from '../../common/interfaces/notifier.interface';

const SEVERITY_STYLE: Record<Severity, { icon: string; paint: (text: string) => string }> = {
  high: { icon: '🚨', paint: chalk.red.bold },
  medium: { icon: '⚠️', paint: chalk.yellow },
  low: { icon: 'ℹ️', paint: chalk.cyan },
};

/**
 * Writes alerts to standard output. Never fails.
 */
export class ConsoleNotifier implements Notifier {
  readonly channel = 'console' as const;

  async send(alert: RenderedAlert): Promise<void> {
    const { icon, paint } = SEVERITY_STYLE[alert.match.severity];
    console.log(`${icon} ${paint(`[${alert.match.severity.toUpperCase()}]`)} ${alert.message}`);
  }
}
