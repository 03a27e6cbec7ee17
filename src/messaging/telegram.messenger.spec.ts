import { Telegraf } from 'telegraf';
import { TelegramMessenger } from './telegram.messenger';

describe('TelegramMessenger', () => {
  it('sends plain text without link previews', async () => {
    const bot = new Telegraf('test-token');
    const sendMessage = jest.spyOn(bot.telegram, 'sendMessage').mockResolvedValue(Object.create(null));

    await new TelegramMessenger(bot).sendMessage('100', 'hello');

    expect(sendMessage).toHaveBeenCalledWith('100', 'hello', { link_preview_options: { is_disabled: true } });
  });
});
