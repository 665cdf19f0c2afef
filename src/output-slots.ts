// Pose Relay - Output slots
// A fixed table of named actuator outputs. Each slot holds at most one
// Dispatcher and can be switched on and off independently; the control loop
// only ever calls broadcast().

import type { ActuatorPayload, SlotName } from "./types.js";
import { SLOT_NAMES } from "./types.js";
import type { Dispatcher, DispatcherStats } from "./dispatcher.js";
import { silentLogger, scopedLogger, type PipelineLogger } from "./logger.js";

/** Builds a fresh, not-yet-started Dispatcher each time a slot is enabled. */
export type DispatcherFactory = () => Dispatcher;

interface Slot {
  factory: DispatcherFactory | null;
  dispatcher: Dispatcher | null;
}

export interface SlotStatus {
  name: SlotName;
  attached: boolean;
  enabled: boolean;
  target: string | null;
  stats: DispatcherStats | null;
}

export function isSlotName(value: string): value is SlotName {
  return (SLOT_NAMES as readonly string[]).includes(value);
}

export class OutputSlots {
  private readonly slots: Record<SlotName, Slot> = {
    primary: { factory: null, dispatcher: null },
    secondary: { factory: null, dispatcher: null },
  };
  private readonly logger: PipelineLogger;
  private readonly joinTimeoutMs: number;

  constructor(options: { logger?: PipelineLogger; joinTimeoutMs?: number } = {}) {
    this.logger = scopedLogger(options.logger ?? silentLogger, "OutputSlots");
    this.joinTimeoutMs = options.joinTimeoutMs ?? 1000;
  }

  /**
   * Register how a slot builds its dispatcher. The slot starts disabled.
   * A stopped Dispatcher cannot restart, so every enable() builds a new one.
   * @throws Error if the slot is currently enabled
   */
  attach(name: SlotName, factory: DispatcherFactory): void {
    const slot = this.slots[name];
    if (slot.dispatcher !== null) {
      throw new Error(`Cannot attach to slot "${name}" while it is enabled`);
    }
    slot.factory = factory;
  }

  /**
   * Build and start the slot's dispatcher.
   * @throws Error if nothing is attached
   */
  enable(name: SlotName): void {
    const slot = this.slots[name];
    if (slot.factory === null) {
      throw new Error(`No dispatcher attached to slot "${name}"`);
    }
    if (slot.dispatcher !== null) {
      this.logger.log(`Slot "${name}" is already enabled`, "warning");
      return;
    }
    const dispatcher = slot.factory();
    dispatcher.start();
    slot.dispatcher = dispatcher;
    this.logger.log(`Slot "${name}" enabled → ${dispatcher.target}`, "info");
  }

  /**
   * Stop the slot's dispatcher and wait (bounded) for its worker.
   * Resolves false if the worker missed the timeout.
   */
  async disable(name: SlotName): Promise<boolean> {
    const slot = this.slots[name];
    if (slot.dispatcher === null) {
      this.logger.log(`Slot "${name}" is already disabled`, "warning");
      return true;
    }
    const dispatcher = slot.dispatcher;
    slot.dispatcher = null;
    dispatcher.stop();
    const joined = await dispatcher.join(this.joinTimeoutMs);
    if (!joined) {
      this.logger.log(`Slot "${name}" dispatcher did not exit within ${this.joinTimeoutMs}ms`, "error");
    } else {
      this.logger.log(`Slot "${name}" disabled`, "info");
    }
    return joined;
  }

  /** Send to every enabled slot. Returns the names that accepted the payload. */
  broadcast(payload: ActuatorPayload): SlotName[] {
    const accepted: SlotName[] = [];
    for (const name of SLOT_NAMES) {
      const dispatcher = this.slots[name].dispatcher;
      if (dispatcher === null) continue;
      if (dispatcher.send(payload)) accepted.push(name);
    }
    return accepted;
  }

  isEnabled(name: SlotName): boolean {
    return this.slots[name].dispatcher !== null;
  }

  get enabledCount(): number {
    return SLOT_NAMES.filter((name) => this.isEnabled(name)).length;
  }

  status(): SlotStatus[] {
    return SLOT_NAMES.map((name) => {
      const { factory, dispatcher } = this.slots[name];
      return {
        name,
        attached: factory !== null,
        enabled: dispatcher !== null,
        target: dispatcher?.target ?? null,
        stats: dispatcher?.getStats() ?? null,
      };
    });
  }

  /**
   * Stop every running dispatcher and wait for all of them,
   * sharing one timeout. Resolves true only if every worker exited.
   */
  async stopAll(timeoutMs: number = this.joinTimeoutMs): Promise<boolean> {
    const pending: Promise<boolean>[] = [];
    for (const name of SLOT_NAMES) {
      const slot = this.slots[name];
      const dispatcher = slot.dispatcher;
      if (dispatcher === null) continue;
      slot.dispatcher = null;
      dispatcher.stop();
      pending.push(
        dispatcher.join(timeoutMs).then((joined) => {
          if (!joined) {
            this.logger.log(`Slot "${name}" dispatcher did not exit within ${timeoutMs}ms`, "error");
          }
          return joined;
        }),
      );
    }
    const results = await Promise.all(pending);
    return results.every(Boolean);
  }
}
