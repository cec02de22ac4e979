/**
 * docschema Event System — Typed event emitter
 *
 * All progress, warning, and completion events of a run flow through this.
 * Observers attach with `subscribe`, which hands back the matching detach.
 */

import { EventEmitter } from 'events';
import type { DocSchemaEvents } from './types.js';

export type DocSchemaEventName = keyof DocSchemaEvents;
export type DocSchemaListener<E extends DocSchemaEventName> = (payload: DocSchemaEvents[E]) => void;

export class DocSchemaEventEmitter extends EventEmitter {
  on<E extends DocSchemaEventName>(event: E, listener: DocSchemaListener<E>): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  off<E extends DocSchemaEventName>(event: E, listener: DocSchemaListener<E>): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  emit<E extends DocSchemaEventName>(event: E, payload: DocSchemaEvents[E]): boolean {
    return super.emit(event, payload);
  }

  subscribe<E extends DocSchemaEventName>(event: E, listener: DocSchemaListener<E>): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }
}
