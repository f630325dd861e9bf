/**
 * Bot API Port
 *
 * The network client plugins use to act on the outside world. The core
 * never calls it; it only hands it to plugins through their extras.
 */
export interface BotApi {
  /** Send a text message to a chat (user or group) */
  sendMessage(chatId: string, text: string): Promise<void>;
}
