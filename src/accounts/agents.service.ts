import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Agent } from './agent.entity';
import { User } from './user.entity';
import { AccountsService } from './accounts.service';
import { AccessPolicy } from './access-policy.service';
import { ROLE_AGENT } from './permissions';
import { IdentifierService } from '../identifiers/identifier.service';
import { CreateAgentDto } from './dto/create-agent.dto';

@Injectable()
export class AgentsService {
  private readonly logger = new Logger(AgentsService.name);

  constructor(
    @InjectRepository(Agent)
    private readonly agentRepository: Repository<Agent>,
    private readonly accountsService: AccountsService,
    private readonly identifierService: IdentifierService,
    private readonly accessPolicy: AccessPolicy,
    private readonly configService: ConfigService,
  ) {}

  /** Promote an existing user: agent profile with a fresh code, plus the Agent role. */
  async promote(actor: User, dto: CreateAgentDto): Promise<Agent> {
    this.accessPolicy.assert(actor, 'agent:add');

    const user = await this.accountsService.findById(dto.userId);
    if (!user) {
      throw new NotFoundException(`User ${dto.userId} not found`);
    }
    if (user.agent) {
      throw new ConflictException(
        `User ${user.id} is already agent ${user.agent.agentCode}`,
      );
    }

    const agentCode = await this.identifierService.generateAgentCode();
    const baseUrl = this.configService.get<string>(
      'REFERRAL_BASE_URL',
      'http://localhost:3000/ref',
    );

    const agent = this.agentRepository.create({
      userId: user.id,
      agentCode,
      referralLink: `${baseUrl.replace(/\/+$/, '')}/${agentCode}`,
    });
    if (dto.commissionRate !== undefined) {
      agent.commissionRate = dto.commissionRate;
    }
    const saved = await this.agentRepository.save(agent);

    await this.accountsService.addRole(user, ROLE_AGENT);
    this.logger.log(`User ${user.id} promoted to agent ${agentCode}`);
    return saved;
  }

  async findForUser(user: User): Promise<Agent> {
    const agent = await this.agentRepository.findOne({
      where: { userId: user.id },
    });
    if (!agent) {
      throw new NotFoundException('No agent profile for this user');
    }
    return agent;
  }
}
