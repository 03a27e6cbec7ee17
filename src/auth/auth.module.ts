import { Module } from '@nestjs/common';
import { MessagingModule } from '../messaging/messaging.module';
import { UsersModule } from '../users/users.module';
import { WorkspaceModule } from '../workspace/workspace.module';
import { AccountLinkService } from './account-link.service';
import { AuthController } from './auth.controller';
import { GoogleAuthService } from './google-auth.service';

@Module({
  imports: [UsersModule, WorkspaceModule, MessagingModule],
  providers: [AccountLinkService, GoogleAuthService],
  controllers: [AuthController],
  exports: [AccountLinkService],
})
export class AuthModule {}
