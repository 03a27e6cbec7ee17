import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { google } from 'googleapis';
import { GoogleIdentity } from '../users/users.service';

const SCOPES = ['openid', 'https://www.googleapis.com/auth/userinfo.email', 'https://www.googleapis.com/auth/userinfo.profile'];

@Injectable()
export class GoogleAuthService {
  private readonly logger = new Logger(GoogleAuthService.name);

  constructor(private readonly configService: ConfigService) {}

  isConfigured(): boolean {
    return Boolean(
      this.configService.get<string>('GOOGLE_OAUTH_CLIENT_ID') &&
        this.configService.get<string>('GOOGLE_OAUTH_CLIENT_SECRET') &&
        this.configService.get<string>('GOOGLE_OAUTH_REDIRECT_URL'),
    );
  }

  generateAuthUrl(state: string): string {
    return this.createClient().generateAuthUrl({
      access_type: 'online',
      scope: SCOPES,
      prompt: 'select_account',
      state,
    });
  }

  /** Exchanges the callback code and reads who signed in. */
  async fetchIdentity(code: string): Promise<GoogleIdentity> {
    const client = this.createClient();
    const { tokens } = await client.getToken(code);
    client.setCredentials(tokens);

    const { data } = await google.oauth2({ version: 'v2', auth: client }).userinfo.get();
    if (!data.id) {
      throw new Error('Google did not return an account id');
    }
    this.logger.log(`🔐 Google sign-in for ${data.email ?? data.id}`);

    return { googleId: data.id, email: data.email ?? undefined, name: data.name ?? undefined };
  }

  private createClient() {
    return new google.auth.OAuth2(
      this.configService.get<string>('GOOGLE_OAUTH_CLIENT_ID'),
      this.configService.get<string>('GOOGLE_OAUTH_CLIENT_SECRET'),
      this.configService.get<string>('GOOGLE_OAUTH_REDIRECT_URL'),
    );
  }
}
