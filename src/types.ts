export interface RawItem {
  name: string;
  path: string;
}

export interface StagedItem {
  itemId: string;
  fileName: string;
  path: string;
  originalName: string;
}

export interface StageResult {
  staged: StagedItem[];
  failed: string[];
}

export interface PipelinePaths {
  inboxDir: string;
  storeDir: string;
  textDir: string;
  cleanedDir: string;
  summaryDir: string;
  finalDir: string;
}

export interface PromptTemplate {
  name: string;
  text: string;
  model: string;
  minLength?: number;
}

export type RenderOrder = 'sorted' | 'completion';

export interface LlmSettings {
  apiKey: string;
  baseURL?: string;
  defaultModel: string;
}

export interface CosSettings {
  secretId: string;
  secretKey: string;
  bucket: string;
  region: string;
  publicBaseUrl: string;
  proxy?: string;
}

export interface PipelineConfig {
  period: string;
  paths: PipelinePaths;
  poolSize: number;
  callTimeoutMs: number;
  dateWindowDays: number;
  minSummaryLength: number;
  linkBaseUrl: string;
  documentTitle: string;
  renderOrder: RenderOrder;
  documentExtensions: readonly string[];
  summaryPrompt: PromptTemplate;
  translationPrompt: PromptTemplate;
}

export type ItemStage = 'convert' | 'clean' | 'summarize';

export interface SummaryRef {
  itemId: string;
  fileName: string;
  summaryPath: string;
}

export type ItemOutcome =
  | ({ ok: true } & SummaryRef)
  | { ok: false; itemId: string; stage: ItemStage; reason: string };

export type ItemFailure = Extract<ItemOutcome, { ok: false }>;

export interface ConversionBatch {
  succeeded: SummaryRef[];
  failed: ItemFailure[];
}

export interface SplitSummary {
  header: string;
  bullets: string[];
}

export interface NormalizedHeader {
  header: string;
  date: string;
  source: string;
  title: string;
}

export interface HighlightEntry extends NormalizedHeader {
  itemId: string;
  bullets: string[];
  link: string;
}

export type DocumentConverter = (filePath: string, signal: AbortSignal) => Promise<string>;

export interface TextService {
  complete(prompt: PromptTemplate, content: string, signal?: AbortSignal): Promise<string>;
}

export interface Publisher {
  publish(localPath: string, key: string): Promise<string>;
}

export type BoundaryPredicate = (line: string) => boolean;

export interface PipelineServices {
  convert: DocumentConverter;
  text: TextService;
  publisher?: Publisher;
  boundaries?: readonly BoundaryPredicate[];
}

export type TranslationStatus = 'translated' | 'skipped' | 'failed';

export interface RunReport {
  period: string;
  staged: number;
  recovered: boolean;
  succeeded: string[];
  failed: ItemFailure[];
  documentPath?: string;
  translation?: TranslationStatus;
}
