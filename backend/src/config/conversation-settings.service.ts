import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INTENT_TYPES, IntentType } from '@cottage-concierge/shared-types';

export type CompletionProvider = 'openai' | 'groq';

const isIntentType = (value: string): value is IntentType =>
  (INTENT_TYPES as readonly string[]).includes(value);

@Injectable()
export class ConversationSettings {
  private readonly logger = new Logger(ConversationSettings.name);

  readonly defaultIntent: IntentType;
  readonly baseOccupancy: number;
  readonly chatHistoryLength: number;
  readonly retrievalDefaultK: number;
  readonly retrievalExpandedK: number;
  readonly collaboratorTimeoutMs: number;
  readonly completionProvider: CompletionProvider;
  readonly propertyName: string;
  readonly contactUrl: string;
  readonly contactPhone: string;

  constructor(private readonly configService: ConfigService) {
    const defaultIntent = this.configService.get<string>('DEFAULT_INTENT') ?? 'faq_question';
    if (!isIntentType(defaultIntent)) {
      throw new Error(`DEFAULT_INTENT "${defaultIntent}" is not a known intent`);
    }
    this.defaultIntent = defaultIntent;

    this.baseOccupancy = this.readPositiveInt('BASE_OCCUPANCY', 6);
    this.chatHistoryLength = this.readPositiveInt('CHAT_HISTORY_LENGTH', 2);
    this.retrievalDefaultK = this.readPositiveInt('RETRIEVAL_DEFAULT_K', 3);
    this.retrievalExpandedK = this.readPositiveInt('RETRIEVAL_EXPANDED_K', 5);
    this.collaboratorTimeoutMs = this.readPositiveInt('COLLABORATOR_TIMEOUT_MS', 15000);

    const provider = (this.configService.get<string>('LLM_PROVIDER') ?? 'openai').toLowerCase();
    if (provider !== 'openai' && provider !== 'groq') {
      throw new Error(`LLM_PROVIDER "${provider}" must be openai or groq`);
    }
    this.completionProvider = provider;

    this.propertyName = this.configService.get<string>('PROPERTY_NAME') ?? 'Hillside Cottages';
    this.contactUrl = this.configService.get<string>('CONTACT_URL') ?? 'https://example.com/book';
    this.contactPhone = this.configService.get<string>('CONTACT_PHONE') ?? '+00 000 0000000';
  }

  private readPositiveInt(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }

    const parsed = typeof raw === 'number' ? raw : Number.parseInt(raw, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      this.logger.warn(`${key}=${String(raw)} is not a positive integer, using ${fallback}`);
      return fallback;
    }

    return parsed;
  }
}
