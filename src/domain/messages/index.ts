/**
 * @module courier-bus/domain/messages
 * @description Immutable message base contract
 */

export { Message, RESERVED_FIELDS, isMessage } from './Message';
export type { MessageKind, MessageOptions, MessageSnapshot } from './Message';
export { currentMicroseconds } from './clock';
