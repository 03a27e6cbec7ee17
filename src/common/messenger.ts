export const MESSENGER = Symbol('MESSENGER');

/** Outbound side of the chat transport. */
export interface Messenger {
  sendMessage(chatId: string, text: string): Promise<void>;
}
