import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { MESSENGER } from '../common/messenger';
import { UsersService } from '../users/users.service';
import { NotionClient } from '../workspace/notion.client';
import { AccountLinkService } from './account-link.service';
import { GoogleAuthService } from './google-auth.service';

async function createService(config: Record<string, string>) {
  const sendMessage = jest.fn().mockResolvedValue(undefined);
  const exchangeCode = jest.fn();
  const moduleRef = await Test.createTestingModule({
    providers: [
      AccountLinkService,
      UsersService,
      GoogleAuthService,
      { provide: ConfigService, useValue: new ConfigService(config) },
      { provide: NotionClient, useValue: { exchangeCode } },
      { provide: MESSENGER, useValue: { sendMessage } },
    ],
  }).compile();

  return {
    links: moduleRef.get(AccountLinkService),
    users: moduleRef.get(UsersService),
    sendMessage,
    exchangeCode,
  };
}

describe('AccountLinkService', () => {
  const notionConfig = { NOTION_CLIENT_ID: 'test-client', NOTION_REDIRECT_URL: 'https://bot.example.com/auth/notion/callback' };

  it('builds the Notion authorize URL with the sender as state', async () => {
    const { links } = await createService(notionConfig);

    const url = new URL(links.workspaceLoginUrl('100') ?? '');

    expect(url.origin + url.pathname).toBe('https://api.notion.com/v1/oauth/authorize');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('redirect_uri')).toBe('https://bot.example.com/auth/notion/callback');
    expect(url.searchParams.get('state')).toBe('100');
  });

  it('sends the login link to the user', async () => {
    const { links, users, sendMessage } = await createService(notionConfig);

    await links.sendWorkspaceLoginLink(users.getOrCreate('100'));

    expect(sendMessage).toHaveBeenCalledTimes(1);
    const [chatId, text] = sendMessage.mock.calls[0];
    expect(chatId).toBe('100');
    expect(text).toContain('https://api.notion.com/v1/oauth/authorize?client_id=test-client');
  });

  it('explains when Notion is not configured', async () => {
    const { links, users, sendMessage } = await createService({});

    expect(links.workspaceLoginUrl('100')).toBeNull();
    await links.sendWorkspaceLoginLink(users.getOrCreate('100'));

    expect(sendMessage).toHaveBeenCalledWith(
      '100',
      "Notion isn't set up on this server yet, so I can't save notes or tables for now.",
    );
  });

  it('links the workspace after the OAuth callback', async () => {
    const { links, users, exchangeCode, sendMessage } = await createService(notionConfig);
    exchangeCode.mockResolvedValue({ access_token: 'test-token', workspace_name: 'Home' });

    await links.completeWorkspaceLink('test-code', '100');

    const user = users.findBySender('100');
    expect(user?.workspaceToken).toBe('test-token');
    expect(sendMessage).toHaveBeenCalledWith('100', "✅ Notion connected (Home)! Ask me again and I'll save it there.");
  });

  it('still links when the confirmation cannot be sent', async () => {
    const { links, users, exchangeCode, sendMessage } = await createService(notionConfig);
    exchangeCode.mockResolvedValue({ access_token: 'test-token' });
    sendMessage.mockRejectedValue(new Error('blocked by user'));

    await links.completeWorkspaceLink('test-code', '100');

    expect(users.findBySender('100')?.workspaceToken).toBe('test-token');
  });

  it('offers a Google sign-in link only when configured', async () => {
    const unconfigured = await createService({});
    const configured = await createService({
      GOOGLE_OAUTH_CLIENT_ID: 'test-client',
      GOOGLE_OAUTH_CLIENT_SECRET: 'test-secret',
      GOOGLE_OAUTH_REDIRECT_URL: 'https://bot.example.com/auth/google/callback',
      PUBLIC_BASE_URL: 'https://bot.example.com/',
    });

    expect(unconfigured.links.googleLoginUrl('100')).toBeNull();
    expect(configured.links.googleLoginUrl('100')).toBe('https://bot.example.com/auth/google/start?sender=100');
  });
});
