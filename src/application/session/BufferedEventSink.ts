import type { EventSink } from '../registry/collaborators.js';
import type { RegistryEvent } from '../registry/events.js';

// Holds notifications until the transaction that produced them has been saved.
export class BufferedEventSink implements EventSink {
  private readonly pending: RegistryEvent[] = [];

  public emit(event: RegistryEvent): void {
    this.pending.push(event);
  }

  public drain(): RegistryEvent[] {
    return this.pending.splice(0, this.pending.length);
  }
}
