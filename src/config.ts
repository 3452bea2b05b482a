import fs from 'node:fs';
import path from 'node:path';
import { isIsoDate, weekAnchor } from './utils/dates';
import { loadPromptTemplate } from './utils/markdown';
import type {
  CosSettings,
  LlmSettings,
  PipelineConfig,
  PipelinePaths,
  RenderOrder
} from './types';

export const ROOT_DIR = process.cwd();
export const ENV_PATH = path.resolve(ROOT_DIR, '.env');
export const DOCUMENT_EXTENSIONS = ['.pdf', '.md', '.markdown', '.txt'];
export const ARCHIVE_EXTENSIONS = ['.zip'];
export const SUMMARY_PROMPT_FILE = 'sellside_summary.md';
export const TRANSLATION_PROMPT_FILE = 'translation.md';
export const DEFAULT_DOCUMENT_TITLE = 'Sellside highlights for Week';
export const DEFAULT_MODEL = 'gemini-2.5-pro';
export const DEFAULT_LINK_BASE_URL = 'http://localhost:8000';

type Env = NodeJS.ProcessEnv;

export interface LoadConfigOptions {
  env?: Env;
  now?: Date;
  rootDir?: string;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<PipelineConfig> {
  const env = options.env ?? process.env;
  const rootDir = options.rootDir ?? ROOT_DIR;
  const period = resolvePeriod(env, options.now ?? new Date());
  const dataDir = path.resolve(rootDir, readOptionalEnv(env, 'DATA_DIR') ?? 'data');
  const inboxOverride = readOptionalEnv(env, 'INBOX_DIR');
  const promptDir = path.resolve(rootDir, readOptionalEnv(env, 'PROMPT_DIR') ?? 'prompt');
  const defaultModel = readOptionalEnv(env, 'LLM_MODEL') ?? DEFAULT_MODEL;
  const [summaryPrompt, translationPrompt] = await Promise.all([
    loadPromptTemplate(path.join(promptDir, SUMMARY_PROMPT_FILE), defaultModel),
    loadPromptTemplate(path.join(promptDir, TRANSLATION_PROMPT_FILE), defaultModel)
  ]);
  const config: PipelineConfig = {
    period,
    paths: buildPaths(
      dataDir,
      period,
      inboxOverride ? path.resolve(rootDir, inboxOverride) : undefined
    ),
    poolSize: readPositiveInt(env, 'POOL_SIZE', 10),
    callTimeoutMs: readPositiveInt(env, 'CALL_TIMEOUT_MS', 10 * 60 * 1000),
    dateWindowDays: readPositiveInt(env, 'DATE_WINDOW_DAYS', 14),
    minSummaryLength: summaryPrompt.minLength ?? 10,
    linkBaseUrl: (
      readOptionalEnv(env, 'LINK_BASE_URL') ??
      readOptionalEnv(env, 'COS_PUBLIC_BASE_URL') ??
      DEFAULT_LINK_BASE_URL
    ).replace(/\/+$/, ''),
    documentTitle: DEFAULT_DOCUMENT_TITLE,
    renderOrder: readRenderOrder(env),
    documentExtensions: DOCUMENT_EXTENSIONS,
    summaryPrompt,
    translationPrompt
  };
  return Object.freeze(config);
}

export function buildPaths(dataDir: string, period: string, inboxDir?: string): PipelinePaths {
  const tempDir = path.join(dataDir, 'temp', period);
  return {
    inboxDir: inboxDir ?? path.join(dataDir, 'inbox', period),
    storeDir: path.join(dataDir, 'store', period),
    textDir: path.join(tempDir, 'text'),
    cleanedDir: path.join(tempDir, 'cleaned'),
    summaryDir: path.join(tempDir, 'summary'),
    finalDir: path.join(dataDir, 'final')
  };
}

export interface ItemArtifactPaths {
  text: string;
  cleaned: string;
  summary: string;
}

export function artifactPaths(paths: PipelinePaths, itemId: string): ItemArtifactPaths {
  const fileName = `${itemId}.md`;
  return {
    text: path.join(paths.textDir, fileName),
    cleaned: path.join(paths.cleanedDir, fileName),
    summary: path.join(paths.summaryDir, fileName)
  };
}

export function loadLlmSettings(env: Env = process.env): LlmSettings {
  const baseURL = readOptionalEnv(env, 'LLM_BASE_URL');
  return {
    apiKey: requireEnv(env, 'LLM_API_KEY'),
    defaultModel: readOptionalEnv(env, 'LLM_MODEL') ?? DEFAULT_MODEL,
    ...(baseURL ? { baseURL } : {})
  };
}

/** Publishing is enabled only when every COS credential is present. */
export function loadCosSettings(env: Env = process.env): CosSettings | undefined {
  const secretId = readOptionalEnv(env, 'COS_SECRETID');
  const secretKey = readOptionalEnv(env, 'COS_SECRETKEY');
  const bucket = readOptionalEnv(env, 'COS_BUCKET');
  const region = readOptionalEnv(env, 'COS_BUCKET_REGION');
  if (!secretId || !secretKey || !bucket || !region) {
    return undefined;
  }
  const uploadHost = `${bucket}.cos.${region}.myqcloud.com`;
  const proxy = readOptionalEnv(env, 'COS_PROXY');
  if (!proxy) {
    ensureNoProxyForHost(env, uploadHost);
    ensureNoProxyForHost(env, '.myqcloud.com');
    ensureNoProxyForHost(env, '.tencentcos.cn');
  }
  return {
    secretId,
    secretKey,
    bucket,
    region,
    publicBaseUrl:
      readOptionalEnv(env, 'COS_PUBLIC_BASE_URL')?.replace(/\/+$/, '') ?? `https://${uploadHost}`,
    ...(proxy ? { proxy } : {})
  };
}

export function hydrateEnv(filePath: string, env: Env = process.env): void {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx === -1) continue;
    const key = trimmed.slice(0, idx).trim();
    if (!key || key in env) {
      continue;
    }
    const value = trimmed.slice(idx + 1).trim().replace(/^['"]|['"]$/g, '');
    env[key] = value;
  }
}

function resolvePeriod(env: Env, now: Date): string {
  const override = readOptionalEnv(env, 'HIGHLIGHTS_PERIOD');
  if (!override) {
    return weekAnchor(now);
  }
  if (!isIsoDate(override)) {
    throw new Error(`HIGHLIGHTS_PERIOD 必须是 YYYY-MM-DD 格式：${override}`);
  }
  return override;
}

function readRenderOrder(env: Env): RenderOrder {
  const value = readOptionalEnv(env, 'RENDER_ORDER') ?? 'sorted';
  if (value !== 'sorted' && value !== 'completion') {
    throw new Error(`RENDER_ORDER 只能是 sorted 或 completion：${value}`);
  }
  return value;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const value = readOptionalEnv(env, key);
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`环境变量 ${key} 必须是正整数：${value}`);
  }
  return parsed;
}

function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`缺少必要的环境变量：${key}`);
  }
  return value;
}

function readOptionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && value.length ? value : undefined;
}

function ensureNoProxyForHost(env: Env, host: string): void {
  const normalizedHost = host.trim().toLowerCase();
  if (!normalizedHost) {
    return;
  }
  const current = env.NO_PROXY?.trim() || env.no_proxy?.trim() || '';
  if (current === '*') {
    return;
  }
  const segments = current
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
  if (segments.some(entry => matchesNoProxy(entry, normalizedHost))) {
    return;
  }
  segments.push(normalizedHost);
  const nextValue = segments.join(',');
  env.NO_PROXY = nextValue;
  env.no_proxy = nextValue;
}

function matchesNoProxy(entry: string, host: string): boolean {
  const normalizedEntry = entry.toLowerCase();
  if (!normalizedEntry) {
    return false;
  }
  if (normalizedEntry === host) {
    return true;
  }
  if (normalizedEntry.startsWith('.')) {
    return host.endsWith(normalizedEntry);
  }
  return false;
}
