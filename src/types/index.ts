export type TranslationInput = {
  author?: string;
  text: string;
  languages?: readonly string[];
  includeRenderedText?: boolean;
}

export type TranslationRequest = {
  author: string;
  text: string;
  targetLanguages: string[];
  includeRenderedText: boolean;
}

export type TranslationResult = {
  readonly author: string;
  readonly originalText: string;
  readonly detectedLanguage: string;
  readonly translations: Readonly<Record<string, string>>;
  readonly renderedText?: string;
}

/**
 * Structured provider answer after validation, before normalization
 */
export type ProviderTranslation = {
  detectedLanguage?: string;
  translations: Record<string, string | null>;
}

export type ProviderPrompt = {
  system: string;
  user: string;
}

export interface TranslationProvider {
  readonly name: string;
  readonly model: string;
  /** Run a single completion and return the raw text of the answer */
  complete(prompt: ProviderPrompt): Promise<string>;
}

export interface Translator {
  translate(input: TranslationInput): Promise<TranslationResult>;
}

export type UserProfile = {
  displayName?: string;
  pictureUrl?: string;
  statusMessage?: string;
}

export type WebhookMessage = {
  type: string;
  id?: string;
  text?: string;
}

export type WebhookEvent = {
  type: string;
  replyToken?: string;
  source?: {
    type?: string;
    userId?: string;
  };
  message?: WebhookMessage;
}

export type WebhookEnvelope = {
  destination?: string;
  events: WebhookEvent[];
}

export type WebhookOutcome = {
  received: number;
  translated: number;
  replied: number;
  skipped: number;
  failed: number;
}
