import type { CaptureResult, CaptureState } from '../types/index.js';

type Slot =
  | { state: 'idle' }
  | { state: 'listening' }
  | { state: 'captured'; result: CaptureResult };

/**
 * One-shot "listen for the next trigger" mode shared by the whole process.
 * The ingestion path offers every trigger; the first one offered while
 * listening claims the slot. Polling a captured result consumes it.
 */
export class CaptureSession {
  private slot: Slot = { state: 'idle' };

  start(): void {
    this.slot = { state: 'listening' };
  }

  cancel(): void {
    this.slot = { state: 'idle' };
  }

  isListening(): boolean {
    return this.slot.state === 'listening';
  }

  /**
   * Returns true when this trigger was captured. Synchronous, so two
   * connections can never both claim the same session.
   */
  offer(trigger: string, port: number, source: string): boolean {
    if (this.slot.state !== 'listening') return false;
    this.slot = { state: 'captured', result: { trigger, port, source } };
    return true;
  }

  poll(): CaptureState {
    switch (this.slot.state) {
      case 'captured': {
        const data = this.slot.result;
        this.slot = { state: 'idle' };
        return { status: 'captured', data };
      }
      case 'listening':
        return { status: 'listening' };
      default:
        return { status: 'idle' };
    }
  }
}
