import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

export interface GoogleIdentity {
  googleId: string;
  email?: string;
  name?: string;
}

export interface UserAccount {
  id: string;
  senderId: string;
  google?: GoogleIdentity;
  workspaceToken?: string;
  workspaceName?: string;
  createdAt: Date;
}

/** Accounts keyed by transport identity (the chat id). */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private users: Map<string, UserAccount> = new Map();

  getOrCreate(senderId: string): UserAccount {
    const existing = this.users.get(senderId);
    if (existing) {
      return existing;
    }
    const user: UserAccount = { id: randomUUID(), senderId, createdAt: new Date() };
    this.users.set(senderId, user);
    this.logger.log(`👤 New user ${user.id} for sender ${senderId}`);
    return user;
  }

  findBySender(senderId: string): UserAccount | undefined {
    return this.users.get(senderId);
  }

  findById(userId: string): UserAccount | undefined {
    return [...this.users.values()].find((user) => user.id === userId);
  }

  linkGoogle(senderId: string, identity: GoogleIdentity): UserAccount {
    const user = this.getOrCreate(senderId);
    user.google = identity;
    this.logger.log(`🔗 Google account ${identity.email ?? identity.googleId} linked to user ${user.id}`);
    return user;
  }

  linkWorkspace(senderId: string, accessToken: string, workspaceName?: string): UserAccount {
    const user = this.getOrCreate(senderId);
    user.workspaceToken = accessToken;
    user.workspaceName = workspaceName;
    this.logger.log(`🔗 Notion workspace ${workspaceName ?? ''} linked to user ${user.id}`);
    return user;
  }

  isWorkspaceLinked(user: UserAccount): boolean {
    return Boolean(user.workspaceToken);
  }
}
