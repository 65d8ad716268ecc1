import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import serenityPromptsLocal from './serenity-prompts.json';

export interface SerenityPrompts {
  personaName: string;
  classificationInstruction: string;
  personaInstruction: string;
  emptyInputReply: string;
  fallbackReplies: string[];
}

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

export function isSerenityPrompts(value: unknown): value is SerenityPrompts {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Partial<Record<keyof SerenityPrompts, unknown>> = value;
  return (
    isNonEmptyString(candidate.personaName) &&
    isNonEmptyString(candidate.classificationInstruction) &&
    isNonEmptyString(candidate.personaInstruction) &&
    isNonEmptyString(candidate.emptyInputReply) &&
    Array.isArray(candidate.fallbackReplies) &&
    candidate.fallbackReplies.length > 0 &&
    candidate.fallbackReplies.every(isNonEmptyString)
  );
}

@Injectable()
export class PromptsService implements OnModuleInit {
  private readonly logger = new Logger(PromptsService.name);
  private readonly s3Client: S3Client | null;
  private prompts: SerenityPrompts = serenityPromptsLocal;
  private readonly bucketName: string;
  private readonly s3Key: string;

  constructor(private configService: ConfigService) {
    this.bucketName = this.configService.get<string>('PROMPTS_S3_BUCKET', '');
    this.s3Key = this.configService.get<string>('PROMPTS_S3_KEY', 'serenity-prompts.json');

    if (this.bucketName) {
      const region = this.configService.get<string>('AWS_REGION', 'us-east-1');
      this.s3Client = new S3Client({ region });
      this.logger.log(`PromptsService initialized with S3: bucket=${this.bucketName}, key=${this.s3Key}, region=${region}`);
    } else {
      this.s3Client = null;
      this.logger.log('PromptsService initialized with local file (S3 bucket not configured)');
    }
  }

  async onModuleInit() {
    await this.loadPrompts();
  }

  /**
   * Load prompts from S3 or fallback to local file
   */
  private async loadPrompts(): Promise<void> {
    if (!this.s3Client) {
      this.prompts = serenityPromptsLocal;
      return;
    }

    try {
      this.logger.log(`Loading prompts from S3: s3://${this.bucketName}/${this.s3Key}`);
      this.prompts = await this.loadPromptsFromS3(this.s3Client);
      this.logger.log('Successfully loaded prompts from S3');
    } catch (error) {
      this.logger.error('Failed to load prompts from S3, falling back to local file', error);
      this.prompts = serenityPromptsLocal;
    }
  }

  private async loadPromptsFromS3(client: S3Client): Promise<SerenityPrompts> {
    const command = new GetObjectCommand({
      Bucket: this.bucketName,
      Key: this.s3Key,
    });

    const response = await client.send(command);
    const bodyContents = await response.Body?.transformToString();

    if (!bodyContents) {
      throw new Error('Empty response from S3');
    }

    const parsed: unknown = JSON.parse(bodyContents);
    if (!isSerenityPrompts(parsed)) {
      throw new Error(`s3://${this.bucketName}/${this.s3Key} is not a valid prompts document`);
    }
    return parsed;
  }

  getPrompts(): SerenityPrompts {
    return this.prompts;
  }

  /**
   * Reload prompts from S3 (useful for hot-reloading configuration)
   */
  async reloadPrompts(): Promise<void> {
    this.logger.log('Reloading prompts...');
    await this.loadPrompts();
  }
}
