import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { And, EntityManager, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import { randomInt } from 'crypto';
import { Agent } from '../accounts/agent.entity';
import { Lead } from '../leads/lead.entity';
import { AGENT_CODE_FALLBACKS_TOTAL } from '../common/metrics.providers';

const AGENT_CODE_PREFIX = 'AGT';
const MAX_AGENT_CODE_ATTEMPTS = 100;
const SHARE_TOKEN_LENGTH = 32;
const SHARE_TOKEN_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Human-readable identifiers assigned at record creation. Both store-backed
 * generators accept the caller's EntityManager so they can run inside a
 * transaction.
 */
@Injectable()
export class IdentifierService {
  private readonly logger = new Logger(IdentifierService.name);

  constructor(
    @InjectRepository(Agent)
    private readonly agentRepository: Repository<Agent>,
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    @InjectMetric(AGENT_CODE_FALLBACKS_TOTAL)
    private readonly fallbackCounter: Counter<string>,
  ) {}

  /**
   * `AGT####`: random 1000-9999 with an existence check, retried up to 100
   * times, then a suffix derived from the epoch seconds. The unique index on
   * agentCode is the final guard against concurrent writers.
   */
  async generateAgentCode(manager?: EntityManager): Promise<string> {
    const agents = manager
      ? manager.getRepository(Agent)
      : this.agentRepository;

    for (let attempt = 0; attempt < MAX_AGENT_CODE_ATTEMPTS; attempt++) {
      const code = `${AGENT_CODE_PREFIX}${randomInt(1000, 10000)}`;
      const taken = await agents.exists({ where: { agentCode: code } });
      if (!taken) {
        return code;
      }
    }

    const suffix = String(Math.floor(Date.now() / 1000) % 10000).padStart(
      4,
      '0',
    );
    const fallback = `${AGENT_CODE_PREFIX}${suffix}`;
    this.fallbackCounter.inc();
    this.logger.warn(
      `All ${MAX_AGENT_CODE_ATTEMPTS} random agent codes collided, using ${fallback}`,
    );
    return fallback;
  }

  /**
   * `<PREFIX>-<YEAR>-<N>` where N is this year's lead count plus one.
   * Read-then-use: two concurrent creations in the same year can draw the
   * same N, and the unique index on referenceNumber rejects the second.
   */
  async generateLeadReference(
    subCategoryName: string,
    year: number,
    manager?: EntityManager,
  ): Promise<string> {
    const leads = manager ? manager.getRepository(Lead) : this.leadRepository;

    const start = new Date(Date.UTC(year, 0, 1));
    const end = new Date(Date.UTC(year + 1, 0, 1));
    const count = await leads.count({
      where: { createdAt: And(MoreThanOrEqual(start), LessThan(end)) },
    });

    return `${referencePrefix(subCategoryName)}-${year}-${count + 1}`;
  }

  /** 32 characters of [A-Za-z0-9]; uniqueness is left to the store. */
  generateShareToken(): string {
    let token = '';
    for (let i = 0; i < SHARE_TOKEN_LENGTH; i++) {
      token += SHARE_TOKEN_ALPHABET[randomInt(SHARE_TOKEN_ALPHABET.length)];
    }
    return token;
  }
}

/** Upper-cased initials of the first two words: "Life Insurance" -> "LI". */
export function referencePrefix(subCategoryName: string): string {
  return subCategoryName
    .trim()
    .split(/\s+/)
    .slice(0, 2)
    .map((word) => word.charAt(0).toUpperCase())
    .join('');
}
