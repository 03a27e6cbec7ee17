import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError } from '../common/errors';
import { MESSENGER, Messenger } from '../common/messenger';
import { UserAccount, UsersService } from '../users/users.service';
import { NotionClient } from '../workspace/notion.client';
import { GoogleAuthService } from './google-auth.service';

const NOTION_AUTHORIZE_URL = 'https://api.notion.com/v1/oauth/authorize';

@Injectable()
export class AccountLinkService {
  private readonly logger = new Logger(AccountLinkService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly users: UsersService,
    private readonly notion: NotionClient,
    private readonly googleAuth: GoogleAuthService,
    @Inject(MESSENGER) private readonly messenger: Messenger,
  ) {}

  /** Notion authorize URL carrying the sender as OAuth state, or null when OAuth is not configured. */
  workspaceLoginUrl(senderId: string): string | null {
    const clientId = this.configService.get<string>('NOTION_CLIENT_ID');
    const redirectUri = this.configService.get<string>('NOTION_REDIRECT_URL');
    if (!clientId || !redirectUri) {
      return null;
    }

    const url = new URL(NOTION_AUTHORIZE_URL);
    url.searchParams.set('client_id', clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('owner', 'user');
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('state', senderId);
    return url.toString();
  }

  googleLoginUrl(senderId: string): string | null {
    if (!this.googleAuth.isConfigured()) {
      return null;
    }
    const base = this.configService.get<string>('PUBLIC_BASE_URL', 'http://localhost:3000').replace(/\/+$/, '');
    return `${base}/auth/google/start?sender=${encodeURIComponent(senderId)}`;
  }

  async sendWorkspaceLoginLink(user: UserAccount): Promise<void> {
    const url = this.workspaceLoginUrl(user.senderId);
    const text = url
      ? `🔗 Connect your Notion workspace to save notes and tables:\n${url}`
      : "Notion isn't set up on this server yet, so I can't save notes or tables for now.";

    await this.messenger.sendMessage(user.senderId, text);
    this.logger.log(`📨 Workspace login link sent to ${user.senderId}`);
  }

  async completeWorkspaceLink(code: string, senderId: string): Promise<UserAccount> {
    const token = await this.notion.exchangeCode(code);
    const user = this.users.linkWorkspace(senderId, token.access_token, token.workspace_name ?? undefined);
    await this.notify(senderId, `✅ Notion connected${user.workspaceName ? ` (${user.workspaceName})` : ''}! Ask me again and I'll save it there.`);
    return user;
  }

  async completeGoogleLink(code: string, senderId: string): Promise<UserAccount> {
    const identity = await this.googleAuth.fetchIdentity(code);
    return this.users.linkGoogle(senderId, identity);
  }

  private async notify(chatId: string, text: string): Promise<void> {
    try {
      await this.messenger.sendMessage(chatId, text);
    } catch (error) {
      this.logger.warn(`Could not notify ${chatId}: ${describeError(error)}`);
    }
  }
}
