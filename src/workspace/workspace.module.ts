import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { NotionClient } from './notion.client';
import { WorkspaceService } from './workspace.service';

@Module({
  imports: [UsersModule],
  providers: [NotionClient, WorkspaceService],
  exports: [NotionClient, WorkspaceService],
})
export class WorkspaceModule {}
