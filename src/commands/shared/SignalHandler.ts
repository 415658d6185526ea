import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

export interface SignalHandlerOptions {
  /** Runs once on the first SIGINT or SIGTERM */
  onShutdown: (signal: NodeJS.Signals) => Promise<void>;
}

/**
 * Runs a shutdown callback on SIGINT/SIGTERM, then exits.
 */
export class SignalHandler {
  private isHandling = false;
  private readonly listener = (signal: NodeJS.Signals): void => this.handleSignal(signal);

  constructor(private readonly options: SignalHandlerOptions) {}

  register(): void {
    process.on('SIGINT', this.listener);
    process.on('SIGTERM', this.listener);
  }

  unregister(): void {
    process.off('SIGINT', this.listener);
    process.off('SIGTERM', this.listener);
  }

  private handleSignal(signal: NodeJS.Signals): void {
    if (this.isHandling) {
      return;
    }
    this.isHandling = true;
    console.error(`\nReceived ${signal}, shutting down...`);
    this.unregister();

    void this.options.onShutdown(signal).then(
      () => process.exit(EXIT_CODES.SUCCESS),
      (error: unknown) => {
        console.error(`Error during shutdown: ${getErrorMessage(error)}`);
        process.exit(EXIT_CODES.SOFTWARE_ERROR);
      }
    );
  }
}
