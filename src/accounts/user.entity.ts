import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToMany,
  JoinTable,
  OneToOne,
} from 'typeorm';
import { Role } from './role.entity';
import type { Agent } from './agent.entity';

export const USER_TYPES = ['superuser', 'admin', 'agent'] as const;
export type UserType = (typeof USER_TYPES)[number];

@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 128, unique: true, nullable: true })
  identityUid!: string | null;

  @Column({ type: 'varchar', length: 150, unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 254, default: '' })
  email!: string;

  @Column({ type: 'varchar', length: 150, default: '' })
  firstName!: string;

  @Column({ type: 'varchar', length: 150, default: '' })
  lastName!: string;

  @Column({ type: 'simple-enum', enum: USER_TYPES, default: 'agent' })
  userType!: UserType;

  @Column({ type: 'varchar', length: 20, default: '' })
  phone!: string;

  @Column({ default: false })
  isStaff!: boolean;

  @Column({ default: false })
  isSuperuser!: boolean;

  @Column({ default: true })
  isActive!: boolean;

  @Column({ type: Date, nullable: true })
  lastLogin!: Date | null;

  @ManyToMany(() => Role, { eager: false })
  @JoinTable({
    name: 'user_roles',
    joinColumn: { name: 'userId', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'roleId', referencedColumnName: 'id' },
  })
  roles!: Role[];

  @OneToOne('Agent', (agent: Agent) => agent.user)
  agent?: Agent | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  get fullName(): string {
    return [this.firstName, this.lastName].filter(Boolean).join(' ');
  }
}
