import { DispatchedCall } from '../common/types';

export const ACKNOWLEDGEMENTS = ['Got it! 👍', 'All set! ✅', 'Done! 😊', "No worries, I've added it! 📅"];

export const NOT_UNDERSTOOD_REPLY = "Sorry, I didn't quite get that. Could you rephrase?";

const INFORMATIVE_LENGTH = 20;

export type Chooser = (options: readonly string[]) => string;

export const randomPick: Chooser = (options) => options[Math.floor(Math.random() * options.length)];

/** Final reply text for a turn, from the model's text and the dispatched results. */
export function reconcileReply(llmText: string, calls: DispatchedCall[], pick: Chooser = randomPick): string {
  const text = llmText.trim();

  if (text === '') {
    if (calls.length === 0) {
      return NOT_UNDERSTOOD_REPLY;
    }
    const firstSuccess = calls.find((call) => call.result.status === 'success');
    const chosen = firstSuccess ?? calls[0];
    const message = chosen.result.message.trim();
    return message !== '' ? message : pick(ACKNOWLEDGEMENTS);
  }

  let reply = text;
  for (const { result } of calls) {
    const message = result.message.trim();
    if (result.status === 'error' && message !== '') {
      reply += `\n\n⚠️ ${message}`;
    } else if (result.status === 'success' && message.length > INFORMATIVE_LENGTH) {
      reply += `\n\n✅ ${message}`;
    }
  }
  return reply;
}
