/**
 * @tunnelbot/gateway -- routing chat events to the tunnel controller.
 */

export {
  ConversationRouter,
  START_COMMAND,
  LAUNCH_COMMAND,
  SHUTDOWN_COMMAND,
  CANCEL_TOKEN,
  WELCOME_MESSAGE,
  CHOOSE_MESSAGE,
  NO_PROFILES_MESSAGE,
  CANCEL_BUTTON,
  CANCELED_MESSAGE,
  UNKNOWN_COMMAND_MESSAGE,
  LAUNCH_FAILED_TOAST,
  MAIN_KEYBOARD,
  launchedToast,
} from './router.js';
export type { RouterReply, MessageReply, CallbackReply, DropReply } from './router.js';

export { EventLoop } from './event-loop.js';
export type { EventLoopOptions } from './event-loop.js';
