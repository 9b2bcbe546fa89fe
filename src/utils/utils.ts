import http from 'http';
import chalk from 'chalk';

/**
 * Anything that can be stopped on a shutdown signal
 */
export interface Stoppable {
  stopMonitoring(): Promise<void>;
}

/**
 * Anything that reports a JSON-serialisable health status
 */
export interface HealthReporter {
  getHealthStatus(): object;
}

/**
 * Delays execution for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 * @returns Promise that resolves after delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Races `promise` against a timer. The timer is cleared whichever settles first.
 * ================================================================
 * @param promise
 * @param timeoutMs
 * @param onTimeout - builds the rejection raised when the timer wins
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function printErrorAndExit(message: string, exitCode = 1): never {
  console.error(`\n ${chalk.red('❌ Error:')} ${message}`);
  process.exit(exitCode);
}

/**
 * Serves `GET /health` with the reporter's status; everything else is a 404
 */
export function runHttpBasedHealthCheck(healthConfig: { port: number }, reporter: HealthReporter): http.Server {
  const server = http.createServer((req, res) => {
    if (req.method === 'GET' && req.url === '/health') {
      const health = reporter.getHealthStatus();
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(health));
    } else {
      res.writeHead(404);
      res.end('Not Found');
    }
  });

  server.on('error', (error) => {
    console.error(`❌ Health check server error: ${error.message}`);
  });

  server.listen(healthConfig.port, () => {
    console.log(`🏥 Health check server listening on port ${healthConfig.port}`);
  });

  return server;
}

export async function gracefulShutdown(signal: string, monitor: Stoppable, server?: http.Server | null): Promise<void> {
  console.log(`📡 Received ${signal}, initiating graceful shutdown...`);
  try {
    await monitor.stopMonitoring();
    server?.close();
    process.exit(0);
  } catch (error) {
    printErrorAndExit(`Error during shutdown: ${error}`, 1);
  }
}
