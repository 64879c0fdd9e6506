import { SessionBusyError } from '../errors';
import { KeyedLock } from './keyedLock';

export type BusyPolicy = 'queue' | 'reject';

/**
 * Admits at most one turn per session at a time. With `queue`, a second
 * message waits for the first to finish; with `reject`, it fails fast with
 * SessionBusyError.
 */
export class SessionGate {
  private readonly lock = new KeyedLock();

  constructor(private readonly policy: BusyPolicy = 'queue') {}

  isBusy(sessionId: string): boolean {
    return this.lock.isHeld(sessionId);
  }

  async run<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    if (this.policy === 'reject' && this.lock.isHeld(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    return this.lock.run(sessionId, work);
  }
}
