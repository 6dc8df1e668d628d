import type { ContactEvent, PropertyChange } from './contact';

/**
 * Messages carried by the EventBus.
 */
export type BusMessage =
  | { readonly kind: 'event'; readonly event: ContactEvent }
  | { readonly kind: 'property_change'; readonly change: PropertyChange }
  | {
      readonly kind: 'resume';
      readonly instanceId: string;
      readonly contactId: string;
      /** wakeAt the scheduler fired for */
      readonly wakeAt: number;
    };

export type BusMessageKind = BusMessage['kind'];

/** Contact a message belongs to */
export function messageContact(message: BusMessage): string {
  switch (message.kind) {
    case 'event':
      return message.event.contactId;
    case 'property_change':
      return message.change.contactId;
    case 'resume':
      return message.contactId;
  }
}
