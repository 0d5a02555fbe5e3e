/**
 * IChatTransport — the chat capability set the bot is built on.
 *
 * The core only ever sends messages, typing indicators, callback answers
 * and message edits, and consumes a stream of text and button events.
 * Transport-specific wire details stay inside the implementation.
 */

export interface Sender {
  /** Stable operator identity (a username); absent when the sender has none. */
  operatorId?: string;
  displayName?: string;
}

export interface MessageRef {
  chatId: string;
  messageId: string;
}

export interface TextEvent {
  kind: 'text';
  chat: MessageRef;
  from: Sender;
  text: string;
  timestamp: Date;
}

export interface CallbackEvent {
  kind: 'callback';
  callbackId: string;
  /** Token of the button that was pressed. */
  token: string;
  /** The message the pressed keyboard belongs to. */
  message: MessageRef;
  from: Sender;
  timestamp: Date;
}

export type InboundEvent = TextEvent | CallbackEvent;

export interface InlineButton {
  text: string;
  token: string;
}

export type Keyboard =
  | { type: 'reply'; rows: string[][] }
  | { type: 'inline'; rows: InlineButton[][] };

export interface BotIdentity {
  id: string;
  username?: string;
  displayName: string;
}

export interface IChatTransport {
  readonly id: string;

  /** Register with the service and begin delivering events. */
  start(): Promise<BotIdentity>;
  stop(): Promise<void>;

  onEvent(handler: (event: InboundEvent) => void): void;
  onError(handler: (error: Error) => void): void;

  sendMessage(chatId: string, text: string, keyboard?: Keyboard): Promise<void>;
  sendTypingIndicator(chatId: string): Promise<void>;
  answerCallback(callbackId: string, text?: string): Promise<void>;
  /** Replace a message's text; any inline keyboard on it is dropped. */
  editMessageText(ref: MessageRef, text: string): Promise<void>;
}
