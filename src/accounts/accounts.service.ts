import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { Repository } from 'typeorm';
import { User } from './user.entity';
import { Role } from './role.entity';
import { ROLE_DEFINITIONS, ROLE_NEW_USER } from './permissions';
import { USERS_PROVISIONED_TOTAL } from '../common/metrics.providers';
import { maskEmail } from '../common/contact-redactor';

/** Claims of a verified identity token that provisioning relies on. */
export interface IdentityClaims {
  uid: string;
  email?: string;
  name?: string;
}

const LAST_LOGIN_THROTTLE_MS = 5 * 60 * 1000;
const USER_RELATIONS = { roles: true, agent: true } as const;

@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @InjectRepository(Role)
    private readonly roleRepository: Repository<Role>,
    @InjectMetric(USERS_PROVISIONED_TOTAL)
    private readonly provisionedCounter: Counter<string>,
  ) {}

  /**
   * Get-or-create the user behind a verified identity. New users start as
   * agents in the permission-less "New User" role until promoted.
   */
  async provisionFromIdentity(claims: IdentityClaims): Promise<User> {
    let user = await this.userRepository.findOne({
      where: { identityUid: claims.uid },
      relations: USER_RELATIONS,
    });

    if (!user) {
      user = await this.createFromIdentity(claims);
    }

    const now = new Date();
    if (
      !user.lastLogin ||
      now.getTime() - user.lastLogin.getTime() > LAST_LOGIN_THROTTLE_MS
    ) {
      await this.userRepository.update(user.id, { lastLogin: now });
      user.lastLogin = now;
    }

    return user;
  }

  async findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({
      where: { id },
      relations: USER_RELATIONS,
    });
  }

  async addRole(user: User, roleName: string): Promise<void> {
    const role = await this.findOrCreateRole(roleName);
    const roles = user.roles ?? [];
    if (roles.some((existing) => existing.id === role.id)) {
      return;
    }
    // Join table only; saving the whole user would touch its agent relation.
    await this.userRepository
      .createQueryBuilder()
      .relation(User, 'roles')
      .of(user.id)
      .add(role.id);
    user.roles = [...roles, role];
  }

  private async createFromIdentity(claims: IdentityClaims): Promise<User> {
    const email = claims.email ?? '';
    const { firstName, lastName } = splitName(claims.name ?? '');
    const newUserRole = await this.findOrCreateRole(ROLE_NEW_USER);

    const user = this.userRepository.create({
      identityUid: claims.uid,
      username: await this.availableUsername(claims.uid, email),
      email,
      firstName,
      lastName,
      userType: 'agent',
      roles: [newUserRole],
    });
    const saved = await this.userRepository.save(user);
    saved.agent = null;

    this.provisionedCounter.inc();
    this.logger.log(
      `Auto-created user ${saved.id} for identity ${claims.uid} (email: ${maskEmail(email) || '-'}) in role '${ROLE_NEW_USER}'`,
    );
    return saved;
  }

  /** Email local part, else the first 30 chars of the uid; suffixed if taken. */
  private async availableUsername(uid: string, email: string): Promise<string> {
    const base = email ? email.split('@')[0] : uid.slice(0, 30);
    const taken = await this.userRepository.exists({
      where: { username: base },
    });
    return taken ? `${base}-${uid.slice(0, 6)}` : base;
  }

  private async findOrCreateRole(name: string): Promise<Role> {
    const existing = await this.roleRepository.findOne({ where: { name } });
    if (existing) {
      return existing;
    }
    return this.roleRepository.save(
      this.roleRepository.create({
        name,
        permissions: [...(ROLE_DEFINITIONS[name] ?? [])],
      }),
    );
  }
}

/** "Asha Rani Verma" -> first "Asha", last "Rani Verma". */
export function splitName(name: string): {
  firstName: string;
  lastName: string;
} {
  if (!name) {
    return { firstName: '', lastName: '' };
  }
  const [firstName, ...rest] = name.split(' ');
  return { firstName, lastName: rest.join(' ') };
}
