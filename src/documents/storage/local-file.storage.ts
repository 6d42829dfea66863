import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { dirname, isAbsolute, join, normalize, sep } from 'path';
import { FileStorage } from '../interfaces/file-storage.interface';

/** Files under MEDIA_ROOT, served by the app under MEDIA_URL. */
@Injectable()
export class LocalFileStorage implements FileStorage {
  private readonly logger = new Logger(LocalFileStorage.name);
  private readonly root: string;
  private readonly baseUrl: string;

  constructor(configService: ConfigService) {
    const mediaRoot = configService.get<string>('MEDIA_ROOT', 'media');
    this.root = isAbsolute(mediaRoot)
      ? mediaRoot
      : join(process.cwd(), mediaRoot);
    this.baseUrl = configService
      .get<string>('MEDIA_URL', '/media')
      .replace(/\/+$/, '');
  }

  async save(
    name: string,
    content: Buffer,
    _contentType: string,
  ): Promise<string> {
    const path = this.pathFor(name);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
    this.logger.debug(`Stored ${name} (${content.length} bytes)`);
    return name;
  }

  url(name: string): string {
    return `${this.baseUrl}/${name}`;
  }

  async delete(name: string): Promise<void> {
    try {
      await unlink(this.pathFor(name));
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
    }
  }

  private pathFor(name: string): string {
    const path = normalize(join(this.root, name));
    if (!path.startsWith(this.root + sep)) {
      throw new Error(`Refusing to access ${name} outside the media root`);
    }
    return path;
  }
}

/** fs errors come from another realm under some runners; match on shape. */
function isMissing(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
