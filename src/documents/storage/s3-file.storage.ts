import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DeleteObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { FileStorage } from '../interfaces/file-storage.interface';

@Injectable()
export class S3FileStorage implements FileStorage {
  private readonly logger = new Logger(S3FileStorage.name);
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly region: string;

  constructor(configService: ConfigService, @Optional() client?: S3Client) {
    this.region = configService.get<string>('AWS_REGION', 'us-east-1');
    this.bucket = configService.get<string>('S3_BUCKET', '');
    this.client = client ?? new S3Client({ region: this.region });
  }

  async save(
    name: string,
    content: Buffer,
    contentType: string,
  ): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: name,
        Body: content,
        ContentType: contentType,
      }),
    );
    this.logger.debug(`Uploaded s3://${this.bucket}/${name}`);
    return name;
  }

  url(name: string): string {
    return `https://${this.bucket}.s3.${this.region}.amazonaws.com/${name}`;
  }

  async delete(name: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: name }),
    );
  }
}
