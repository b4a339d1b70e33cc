import type { FileNotifier, NotifierEvent, NotifierListener } from '../../filewatch/types.js';

/**
 * In-process FileNotifier: tests push raw events with `emit`.
 */
export class FakeNotifier implements FileNotifier {
  private listeners = new Set<NotifierListener>();
  closeCalls = 0;

  constructor(private readonly setupError?: Error) {}

  // Created on access so a failing setup is never an unobserved rejection
  get ready(): Promise<void> {
    return this.setupError ? Promise.reject(this.setupError) : Promise.resolve();
  }

  onEvent(listener: NotifierListener): void {
    this.listeners.add(listener);
  }

  emit(event: NotifierEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.listeners.clear();
  }
}
