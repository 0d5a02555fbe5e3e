/**
 * ConversationRouter -- maps inbound chat events to replies.
 *
 * Text commands are matched by prefix, so `/launch@my_bot` (the form
 * Telegram uses in group chats) reaches the launch handler. Button presses
 * carry either a profile label or the cancel token; anything else is a
 * button from an outdated keyboard and is dropped without a reply.
 *
 * The router holds no conversation state. Its output is a description of
 * the reply; the EventLoop turns it into transport calls.
 */

import { findProfile } from '@tunnelbot/tunnels';
import type {
  CallbackEvent,
  ITunnelController,
  InboundEvent,
  Keyboard,
  MessageRef,
  TextEvent,
  TunnelProfile,
} from '@tunnelbot/core';

// ---------------------------------------------------------------------------
// Commands and messages
// ---------------------------------------------------------------------------

export const START_COMMAND = '/start';
export const LAUNCH_COMMAND = '/launch';
export const SHUTDOWN_COMMAND = '/shutdown';
/** Callback token of the Cancel button; never a valid profile label. */
export const CANCEL_TOKEN = '/cancel';

export const WELCOME_MESSAGE = 'Welcome';
export const CHOOSE_MESSAGE = 'Choose to launch';
export const NO_PROFILES_MESSAGE = 'No profiles configured';
export const CANCEL_BUTTON = 'Cancel';
export const CANCELED_MESSAGE = 'Canceled';
export const UNKNOWN_COMMAND_MESSAGE = 'Unknown command';
export const LAUNCH_FAILED_TOAST = 'Launch failed';

export function launchedToast(label: string): string {
  return `Launched: ${label}`;
}

/** The persistent two-button keyboard under the input field. */
export const MAIN_KEYBOARD: Keyboard = {
  type: 'reply',
  rows: [[LAUNCH_COMMAND, SHUTDOWN_COMMAND]],
};

// ---------------------------------------------------------------------------
// Replies
// ---------------------------------------------------------------------------

export interface MessageReply {
  kind: 'message';
  chatId: string;
  text: string;
  keyboard: Keyboard;
}

export interface CallbackReply {
  kind: 'callback';
  callbackId: string;
  /** Short notice shown by the client; none for a plain acknowledgement. */
  toast?: string;
  edit: { ref: MessageRef; text: string };
}

export interface DropReply {
  kind: 'drop';
  reason: string;
}

export type RouterReply = MessageReply | CallbackReply | DropReply;

// ---------------------------------------------------------------------------
// ConversationRouter
// ---------------------------------------------------------------------------

export class ConversationRouter {
  constructor(
    private readonly profiles: readonly TunnelProfile[],
    private readonly controller: ITunnelController,
  ) {}

  route(event: InboundEvent): Promise<RouterReply> {
    return event.kind === 'text' ? this.routeText(event) : this.routeCallback(event);
  }

  // ---------------------------------------------------------------------------
  // Text commands
  // ---------------------------------------------------------------------------

  private async routeText(event: TextEvent): Promise<RouterReply> {
    const chatId = event.chat.chatId;
    const text = event.text;

    if (text.startsWith(START_COMMAND)) {
      return this.message(chatId, WELCOME_MESSAGE);
    }

    if (text.startsWith(LAUNCH_COMMAND)) {
      if (this.profiles.length === 0) {
        return this.message(chatId, NO_PROFILES_MESSAGE);
      }
      return this.message(chatId, CHOOSE_MESSAGE, this.profileKeyboard());
    }

    if (text.startsWith(SHUTDOWN_COMMAND)) {
      const result = await this.controller.shutdown();
      return this.message(chatId, result.message);
    }

    return this.message(chatId, text ? `${text}: ${UNKNOWN_COMMAND_MESSAGE}` : UNKNOWN_COMMAND_MESSAGE);
  }

  // ---------------------------------------------------------------------------
  // Button presses
  // ---------------------------------------------------------------------------

  private async routeCallback(event: CallbackEvent): Promise<RouterReply> {
    if (event.token === CANCEL_TOKEN) {
      return {
        kind: 'callback',
        callbackId: event.callbackId,
        edit: { ref: event.message, text: CANCELED_MESSAGE },
      };
    }

    const profile = findProfile(this.profiles, event.token);
    if (!profile) {
      return { kind: 'drop', reason: `unrecognized selection "${event.token}"` };
    }

    const result = await this.controller.launch(profile);
    return {
      kind: 'callback',
      callbackId: event.callbackId,
      toast: result.ok ? launchedToast(profile.label) : LAUNCH_FAILED_TOAST,
      edit: { ref: event.message, text: result.message },
    };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private message(chatId: string, text: string, keyboard: Keyboard = MAIN_KEYBOARD): MessageReply {
    return { kind: 'message', chatId, text, keyboard };
  }

  /** One button per profile, in configuration order, then Cancel. */
  private profileKeyboard(): Keyboard {
    return {
      type: 'inline',
      rows: [
        ...this.profiles.map((p) => [{ text: p.label, token: p.label }]),
        [{ text: CANCEL_BUTTON, token: CANCEL_TOKEN }],
      ],
    };
  }
}
