import { BadRequestException, Controller, Get, Logger, Query, Res } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { describeError, errorStack } from '../common/errors';
import { AccountLinkService } from './account-link.service';
import { GoogleAuthService } from './google-auth.service';

function page(title: string, body: string): string {
  return `<html>
  <body>
    <h2>${title}</h2>
    <p>${body}</p>
  </body>
</html>`;
}

@Controller('auth')
export class AuthController {
  private readonly logger = new Logger(AuthController.name);

  constructor(
    private readonly accountLinks: AccountLinkService,
    private readonly googleAuth: GoogleAuthService,
    private readonly configService: ConfigService,
  ) {}

  @Get('google/start')
  startGoogle(@Query('sender') sender: string | undefined, @Res() res: Response) {
    if (!sender) {
      throw new BadRequestException('sender is required');
    }
    if (!this.googleAuth.isConfigured()) {
      throw new BadRequestException('Google sign-in is not configured');
    }
    res.redirect(this.googleAuth.generateAuthUrl(sender));
  }

  @Get('google/callback')
  async googleCallback(
    @Query('code') code: string | undefined,
    @Query('state') state: string | undefined,
    @Res() res: Response,
  ) {
    if (!code || !state) {
      throw new BadRequestException('Authorization code not provided');
    }

    try {
      await this.accountLinks.completeGoogleLink(code, state);
    } catch (error) {
      this.logger.error(`Google callback failed: ${describeError(error)}`, errorStack(error));
      res.status(500).send(page('❌ Sign-in failed', 'Please go back to the chat and try /login again.'));
      return;
    }

    const botUsername = this.configService.get<string>('TELEGRAM_BOT_USERNAME');
    if (botUsername) {
      res.redirect(`https://t.me/${botUsername}?start=auth_success`);
      return;
    }
    res.send(page('✅ Google account connected!', 'You can close this window and go back to the chat.'));
  }

  @Get('notion/callback')
  async notionCallback(
    @Query('code') code: string | undefined,
    @Query('state') state: string | undefined,
    @Query('error') error: string | undefined,
    @Res() res: Response,
  ) {
    if (error) {
      this.logger.warn(`Notion authorization refused: ${error}`);
      res.status(400).send(page('Notion was not connected', 'Access was not granted. You can try again from the chat.'));
      return;
    }
    if (!code || !state) {
      throw new BadRequestException('Authorization code not provided');
    }

    try {
      await this.accountLinks.completeWorkspaceLink(code, state);
    } catch (linkError) {
      this.logger.error(`Notion callback failed: ${describeError(linkError)}`, errorStack(linkError));
      res.status(500).send(page('❌ Failed to connect Notion', 'Please go back to the chat and try again.'));
      return;
    }
    res.send(page('✅ Notion connected!', 'You can close this window and go back to the chat.'));
  }
}
