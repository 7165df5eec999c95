import { promises as fs } from 'fs';
import path from 'path';
import Redis from 'ioredis';
import { v4 as uuid } from 'uuid';
import type { BrandProfile } from '../../utils/types';
import { PersistenceFailedError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { silentLogger } from '../../utils/logger';
import type { AppEnv } from '../../config/env';
import { brandProfileSchema, emptyProfile } from './profile';

/**
 * Persists the one brand profile. `load` never throws and falls back to an
 * empty profile; `save` replaces the stored profile wholesale and reports
 * failure as `false`.
 */
export interface ProfileStore {
  readonly description: string;
  load(): Promise<BrandProfile>;
  save(profile: BrandProfile): Promise<boolean>;
}

function parseProfile(raw: string): BrandProfile | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = brandProfileSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function serializeProfile(profile: BrandProfile): string {
  return JSON.stringify(brandProfileSchema.parse(profile), null, 2);
}

export class FileProfileStore implements ProfileStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  get description(): string {
    return `file ${this.filePath}`;
  }

  async load(): Promise<BrandProfile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return emptyProfile();
      }
      this.logger.warn('Could not read brand profile', new PersistenceFailedError('load', this.filePath, err));
      return emptyProfile();
    }

    const profile = parseProfile(raw);
    if (!profile) {
      this.logger.warn(`Ignoring unreadable brand profile at ${this.filePath}`);
      return emptyProfile();
    }
    return profile;
  }

  // Each save gets its own sibling temp file, renamed over the target; the last rename wins
  async save(profile: BrandProfile): Promise<boolean> {
    const tmpPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${uuid()}.tmp`);

    try {
      await fs.writeFile(tmpPath, serializeProfile(profile), 'utf8');
      await fs.rename(tmpPath, this.filePath);
      return true;
    } catch (err) {
      this.logger.error('Could not save brand profile', new PersistenceFailedError('save', this.filePath, err));
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.debug('Could not remove temporary profile file', cleanupErr);
      });
      return false;
    }
  }
}

/** The subset of the ioredis client the store calls. */
export interface ProfileRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export const DEFAULT_PROFILE_KEY = 'brand:profile';

export class RedisProfileStore implements ProfileStore {
  constructor(
    private readonly redis: ProfileRedisClient,
    private readonly key: string = DEFAULT_PROFILE_KEY,
    private readonly logger: Logger = silentLogger
  ) {}

  get description(): string {
    return `redis key ${this.key}`;
  }

  async load(): Promise<BrandProfile> {
    try {
      const raw = await this.redis.get(this.key);
      if (raw === null) return emptyProfile();
      const profile = parseProfile(raw);
      if (!profile) {
        this.logger.warn(`Ignoring unreadable brand profile at ${this.description}`);
      }
      return profile ?? emptyProfile();
    } catch (err) {
      this.logger.warn('Could not read brand profile', new PersistenceFailedError('load', this.description, err));
      return emptyProfile();
    }
  }

  async save(profile: BrandProfile): Promise<boolean> {
    try {
      await this.redis.set(this.key, serializeProfile(profile));
      return true;
    } catch (err) {
      this.logger.error('Could not save brand profile', new PersistenceFailedError('save', this.description, err));
      return false;
    }
  }
}

export function createRedisClient(config: Pick<AppEnv, 'REDIS_URL' | 'REDIS_PASSWORD'>, logger: Logger): Redis {
  const redis = new Redis(config.REDIS_URL, {
    password: config.REDIS_PASSWORD || undefined,
    maxRetriesPerRequest: 3
  });

  redis.on('connect', () => logger.info('Connected to Redis'));
  redis.on('error', (err: Error) => logger.error('Redis error', err));

  return redis;
}

export function createProfileStore(
  config: Pick<AppEnv, 'PROFILE_STORE' | 'PROFILE_PATH' | 'REDIS_URL' | 'REDIS_PASSWORD'>,
  logger: Logger
): ProfileStore {
  if (config.PROFILE_STORE === 'redis') {
    if (!config.REDIS_URL) {
      throw new Error('REDIS_URL is required when PROFILE_STORE=redis');
    }
    return new RedisProfileStore(createRedisClient(config, logger), DEFAULT_PROFILE_KEY, logger);
  }
  return new FileProfileStore(path.resolve(config.PROFILE_PATH), logger);
}
