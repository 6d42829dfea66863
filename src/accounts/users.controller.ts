import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { CurrentUser } from '../auth/current-user.decorator';
import { User } from './user.entity';

export interface UserProfile {
  id: number;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  userType: string;
  roles: string[];
  agentCode: string | null;
  isActive: boolean;
  lastLogin: string | null;
  dateJoined: string;
}

function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    userType: user.userType,
    roles: (user.roles ?? []).map((role) => role.name),
    agentCode: user.agent?.agentCode ?? null,
    isActive: user.isActive,
    lastLogin: user.lastLogin ? user.lastLogin.toISOString() : null,
    dateJoined: user.createdAt.toISOString(),
  };
}

@Controller('users')
export class UsersController {
  @Get('me')
  me(@CurrentUser() user: User): UserProfile {
    return toProfile(user);
  }

  /** Provisioning already ran in the guard; this confirms it to the client. */
  @Post('me/sync')
  @HttpCode(HttpStatus.OK)
  sync(@CurrentUser() user: User) {
    return {
      success: true,
      user: toProfile(user),
      message: 'User synced successfully',
    };
  }
}
