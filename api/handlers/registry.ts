import { z } from "zod";
import { ValidationError } from "../lib/errors.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";
import { isCancellationSlot, isEventType, isServiceToken } from "./definitions.js";
import type {
  ErasedHandler,
  ErasedHandlerDefinition,
  EventType,
  HandlerDescriptor,
  RegisteredHandler,
  Slot,
} from "./types.js";

/**
 * Handler Registry
 *
 * Collects handlers per event type at setup time. Every handler is
 * validated when it is registered, so shape mistakes fail at startup rather
 * than on the first event. Once sealed (by building a dispatch table) the
 * registry rejects further registrations.
 */

const ReturnDeclarationSchema = z.object({
  returns: z.enum(["void", "signal", "result", "auto"]),
  async: z.boolean(),
});

export interface HandlerRegistryOptions {
  logger?: Logger;
}

export class HandlerRegistry {
  private readonly ordered: HandlerDescriptor[] = [];
  private readonly byEvent = new Map<string, HandlerDescriptor[]>();
  private readonly eventTypesByName = new Map<string, EventType>();
  private readonly logger: Logger;
  private sealed = false;

  constructor(options: HandlerRegistryOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Register a handler for an event type.
   *
   * @throws ValidationError if the registry is sealed or the handler's
   *   declared shape cannot be dispatched
   */
  register<TEvent extends EventType>(eventType: TEvent, handler: RegisteredHandler<TEvent>): this {
    if (this.sealed) {
      throw new ValidationError("registry sealed");
    }
    if (!isEventType(eventType)) {
      throw new ValidationError("event type must be created with defineEvent");
    }

    const descriptor =
      typeof handler === "function"
        ? this.describeFunction(eventType, handler)
        : this.describeDefinition(eventType, handler);

    const bound = this.eventTypesByName.get(eventType.name);
    if (bound !== undefined && bound !== eventType) {
      throw new ValidationError(
        `event name "${eventType.name}" is already bound to another event type`,
        descriptor.name,
      );
    }

    this.eventTypesByName.set(eventType.name, eventType);
    const handlers = this.byEvent.get(eventType.name) ?? [];
    handlers.push(descriptor);
    this.byEvent.set(eventType.name, handlers);
    this.ordered.push(descriptor);

    this.logger.debug(
      `[${eventType.name}] Registered handler "${descriptor.name}" (slots=${descriptor.slots.length}, returns=${descriptor.returns}${descriptor.async ? ", async" : ""})`,
    );
    return this;
  }

  /** Stop accepting registrations. Idempotent. */
  seal(): void {
    this.sealed = true;
  }

  /** Every descriptor, in registration order across all event types. */
  descriptors(): readonly HandlerDescriptor[] {
    return [...this.ordered];
  }

  descriptorsFor(eventName: string): readonly HandlerDescriptor[] {
    return [...(this.byEvent.get(eventName) ?? [])];
  }

  eventTypes(): EventType[] {
    return Array.from(this.eventTypesByName.values());
  }

  handlerCount(eventName: string): number {
    return this.byEvent.get(eventName)?.length ?? 0;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Validation
  // ───────────────────────────────────────────────────────────────────────────

  private describeFunction(eventType: EventType, handle: ErasedHandler): HandlerDescriptor {
    const name = handle.name || `${eventType.name}#${this.handlerCount(eventType.name) + 1}`;
    assertArity(handle, 0, name);

    // Whatever a bare function returns is awaited; a Result is kept, anything else is success.
    const descriptor: HandlerDescriptor = {
      eventType,
      name,
      slots: Object.freeze([]),
      returns: "auto",
      async: true,
      handle,
    };
    return Object.freeze(descriptor);
  }

  private describeDefinition(
    eventType: EventType,
    definition: ErasedHandlerDefinition<EventType>,
  ): HandlerDescriptor {
    const name = typeof definition.name === "string" ? definition.name.trim() : "";
    if (name === "") {
      throw new ValidationError("handler name must be a non-empty string");
    }

    if (definition.event !== eventType) {
      const declared = isEventType(definition.event) ? definition.event.name : "an unknown event";
      throw new ValidationError(
        `handler is declared for ${declared} but was registered for ${eventType.name}`,
        name,
      );
    }

    const declaration = ReturnDeclarationSchema.safeParse({
      returns: definition.returns,
      async: definition.async,
    });
    if (!declaration.success) {
      throw new ValidationError("unsupported return shape", name);
    }

    if (typeof definition.handle !== "function") {
      throw new ValidationError("handle must be a function", name);
    }

    const slots = validateSlots(definition.inject, name);
    assertArity(definition.handle, slots.length, name);

    const descriptor: HandlerDescriptor = {
      eventType,
      name,
      slots,
      returns: declaration.data.returns,
      async: declaration.data.async,
      handle: definition.handle,
    };
    return Object.freeze(descriptor);
  }
}

/**
 * Dependency slots come first; a cancellation slot, if any, is last.
 */
function validateSlots(inject: unknown, handlerName: string): readonly Slot[] {
  if (!Array.isArray(inject)) {
    throw new ValidationError("inject must be an array of slots", handlerName);
  }

  const slots: Slot[] = [];
  inject.forEach((slot: unknown, index) => {
    if (isCancellationSlot(slot)) {
      if (index !== inject.length - 1) {
        throw new ValidationError("the cancellation slot must be the last parameter", handlerName);
      }
      slots.push(slot);
      return;
    }
    if (!isServiceToken(slot)) {
      throw new ValidationError(
        `parameter ${index + 2} is neither a service token nor the cancellation slot`,
        handlerName,
      );
    }
    slots.push(slot);
  });

  return Object.freeze(slots);
}

/**
 * The event parameter is mandatory, and the function may not expect more
 * arguments than the event plus its slots.
 */
function assertArity(handle: ErasedHandler, slotCount: number, handlerName: string): void {
  if (handle.length < 1) {
    throw new ValidationError("handler must accept the event as its first parameter", handlerName);
  }
  if (handle.length > slotCount + 1) {
    throw new ValidationError(
      `handler declares ${handle.length} parameters but only ${slotCount + 1} can be supplied`,
      handlerName,
    );
  }
}

export function createHandlerRegistry(options: HandlerRegistryOptions = {}): HandlerRegistry {
  return new HandlerRegistry(options);
}
