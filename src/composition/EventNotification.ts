/**
 * @module
 *
 * This module provides an implementation of the Subscription model, where `EventNotifier` can `invoke` events and upon event invocation, all subscribers on this event will be "notified" -- their registered handlers will be called.
 *
 * Events are typed through an event map: a record from event name to the tuple of arguments that event carries.
 *
 * @example
 * type Events = { mutate: [kind: string, index: number] };
 * const notifier = new EventNotifier<Events>();
 * notifier.subscribe(logger, 'mutate', (eventName, source, subscriber, kind, index) => ...);
 * notifier.invoke('mutate', 'insert', 0);
 */

/**
 * Maps each event name to the arguments its invocation carries.
 */
export type EventMap = Record<string, Array<unknown>>;

/**
 * Represents a event handler function. Provided by subscriber at event subscription.
 *
 * @param eventName - which event this handler responds to.
 * @param source - A reference to the event source.
 * @param subscriber - A reference to the subscriber.
 * @param eventArgs - The arguments the event was invoked with.
 */
export type EventHandler<TEvents extends EventMap, TEventName extends keyof TEvents> = (
  eventName: TEventName,
  source: EventNotifier<TEvents>,
  subscriber: unknown,
  ...eventArgs: TEvents[TEventName]
) => void;

/**
 * A dictionary stores information about event subscription. It is a mapping from event name to a mapping from subscriber to event handler.
 */
type EventSubscription<TEvents extends EventMap> = {
  [TEventName in keyof TEvents]?: Map<unknown, EventHandler<TEvents, TEventName>>;
};

/**
 * An entity that is able to `invoke` events and can accept event subscription.
 */
export class EventNotifier<TEvents extends EventMap> {
  /** Stores information about active subscriptions for each event. */
  protected eventSubscription: EventSubscription<TEvents> = {};
  /** A set of events that should not be invoked. It can be useful in temporarily disabling emitting of certain events. */
  protected _disabledEventNames: Set<keyof TEvents> = new Set();

  /**
   * Register an event subscription. A subscriber has at most one handler per event: subscribing again replaces the previous handler.
   *
   * @param subscriber - A reference to the subscriber.
   * @param eventName - The event that this handler responds to.
   * @param eventHandler - How invocation of specified event will be handled for this subscriber.
   */
  subscribe<TEventName extends keyof TEvents>(
    subscriber: unknown,
    eventName: TEventName,
    eventHandler: EventHandler<TEvents, TEventName>
  ): void {
    let handlers: Map<unknown, EventHandler<TEvents, TEventName>> | undefined =
      this.eventSubscription[eventName];
    if (handlers === undefined) {
      handlers = new Map();
      this.eventSubscription[eventName] = handlers;
    }

    handlers.set(subscriber, eventHandler);
  }

  /**
   * Unregister an event subscription.
   *
   * @param subscriber - A reference to the subscriber.
   * @param eventName - The event which this subscriber is unsubscribing from.
   * @returns Whether the un-subscription is successful -- if a subscription previously exists and is removed.
   */
  unsubscribe(subscriber: unknown, eventName: keyof TEvents): boolean {
    const handlers = this.eventSubscription[eventName];
    return handlers !== undefined && handlers.delete(subscriber);
  }

  /**
   * @returns Whether anyone currently listens to the event. Sources can skip notification work when nobody does.
   */
  hasSubscribers(eventName: keyof TEvents): boolean {
    const handlers = this.eventSubscription[eventName];
    return handlers !== undefined && handlers.size > 0 && !this._disabledEventNames.has(eventName);
  }

  /**
   * Emit an event. Notify all subscribers of this event.
   *
   * @param eventName - Name of the event which should be invoked.
   * @param eventArgs - The event arguments.
   */
  invoke<TEventName extends keyof TEvents>(
    eventName: TEventName,
    ...eventArgs: TEvents[TEventName]
  ): void {
    const handlers = this.eventSubscription[eventName];
    if (!this._disabledEventNames.has(eventName) && handlers !== undefined) {
      // notify every subscriber
      for (const [subscriber, eventHandler] of handlers) {
        eventHandler(eventName, this, subscriber, ...eventArgs);
      }
    }
  }

  /**
   * Prevents an event from being invoked.
   *
   * @param eventName - The name of the disabled event.
   */
  disableEventNotification(eventName: keyof TEvents): void {
    this._disabledEventNames.add(eventName);
  }

  /**
   * Re-allows an event to be invoked.
   *
   * @param eventName - The name of the disabled event. No effect if the specified event is already enabled.
   */
  enableEventNotification(eventName: keyof TEvents): boolean {
    return this._disabledEventNames.delete(eventName);
  }
}
