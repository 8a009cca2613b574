import { readFile } from "node:fs/promises";
import { availableParallelism } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../lib/errors.js";

const SpeechRateSchema = z
  .string()
  .regex(/^[+-]\d{1,3}%$/, 'speechRate must look like "+15%" or "-10%"');

export const BookConfigSchema = z.object({
  name: z.string().min(1),
  epubFile: z.string().min(1),
  coverImage: z.string().min(1),
  remoteFolder: z.string().min(1),
  targetVideoDurationMinutes: z.number().positive(),
  voice: z.string().min(1),
  speechRate: SpeechRateSchema,
});

export const BookCatalogSchema = z.record(BookConfigSchema);

export type BookConfig = z.infer<typeof BookConfigSchema>;
export type BookCatalog = z.infer<typeof BookCatalogSchema>;

const envBoolean = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const positiveInt = z.coerce.number().int().positive();

export const PipelineEnvSchema = z.object({
  NARRATION_BOOK_ID: z.string().min(1, "NARRATION_BOOK_ID is required"),
  NARRATION_WORKDIR: z.string().optional(),
  NARRATION_AUDIO_CONCURRENCY: positiveInt.default(6),
  NARRATION_REGEN_CONCURRENCY: positiveInt.default(4),
  NARRATION_MAX_RETRIES: positiveInt.default(3),
  NARRATION_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  NARRATION_VIDEO_MAX_WORKERS: positiveInt.optional(),
  NARRATION_ENABLE_UPLOAD: envBoolean.default("true"),
  NARRATION_UPLOADER: z.enum(["rclone", "supabase", "local"]).default("rclone"),
  NARRATION_RCLONE_REMOTE: z.string().min(1).default("gdrive"),
  NARRATION_SUPABASE_BUCKET: z.string().min(1).default("narration-videos"),
  NARRATION_TTS_PROVIDER: z.enum(["edge-tts", "azure"]).default("edge-tts"),
  NARRATION_WORDS_PER_MINUTE: z.coerce.number().positive().default(150),
  NARRATION_SUSPECT_DURATION_RATIO: z.coerce.number().gt(0).lt(1).default(0.5),
  NARRATION_SUSPECT_MIN_BYTES: z.coerce.number().int().nonnegative().default(102_400),
  NARRATION_MIN_CLIP_SECONDS: z.coerce.number().nonnegative().default(1),
  NARRATION_MIN_VIDEO_BYTES: z.coerce.number().int().nonnegative().default(102_400),
});

export type PipelineEnv = z.infer<typeof PipelineEnvSchema>;

export type PipelinePaths = {
  workdir: string;
  chaptersDir: string;
  audioDir: string;
  videosDir: string;
  imagesDir: string;
  cacheDir: string;
  coverImage: string;
  durationIndex: string;
  regenerateList: string;
};

export type SanityThresholds = {
  /** Absolute floor below which an existing clip is not a valid output at all. */
  minClipSeconds: number;
  /** Clip is suspect when shorter than this fraction of the text-based estimate. */
  suspectDurationRatio: number;
  suspectMinBytes: number;
  wordsPerMinute: number;
  minVideoBytes: number;
};

export type PipelineConfig = {
  bookId: string;
  book: BookConfig;
  /** Multiplier derived from book.speechRate ("+15%" -> 1.15). */
  rateMultiplier: number;
  paths: PipelinePaths;
  audioConcurrency: number;
  regenConcurrency: number;
  maxRetries: number;
  retryBaseMs: number;
  videoMaxWorkers: number;
  targetVideoSeconds: number;
  upload: {
    enabled: boolean;
    uploader: PipelineEnv["NARRATION_UPLOADER"];
    rcloneRemote: string;
    supabaseBucket: string;
  };
  ttsProvider: PipelineEnv["NARRATION_TTS_PROVIDER"];
  thresholds: SanityThresholds;
};

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseSpeechRate(rate: string): number {
  const parsed = SpeechRateSchema.safeParse(rate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid speech rate "${rate}"`);
  }
  const percent = Number(rate.slice(0, -1));
  const multiplier = 1 + percent / 100;
  if (multiplier <= 0) {
    throw new ConfigError(`Speech rate ${rate} leaves no speech`);
  }
  return multiplier;
}

export function parseBookCatalog(raw: unknown): BookCatalog {
  const parsed = BookCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid book catalog: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadBookCatalog(path: string): Promise<BookCatalog> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read book catalog ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Book catalog ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseBookCatalog(raw);
}

export function buildPipelinePaths(workdir: string, book: BookConfig): PipelinePaths {
  const root = resolve(workdir);
  const imagesDir = join(root, "images");
  return {
    workdir: root,
    chaptersDir: join(root, "chapters"),
    audioDir: join(root, "audio"),
    videosDir: join(root, "videos"),
    imagesDir,
    cacheDir: join(root, ".cache"),
    coverImage: join(imagesDir, book.coverImage),
    durationIndex: join(root, "chapter_durations.csv"),
    regenerateList: join(root, "chapters_to_regenerate.txt"),
  };
}

/**
 * Resolve the selected book and every tunable into one immutable value.
 * Components receive this explicitly; nothing reads process.env after here.
 */
export function loadPipelineConfig(params: {
  env: Record<string, string | undefined>;
  catalog: BookCatalog;
  cwd?: string;
}): PipelineConfig {
  const parsed = PipelineEnvSchema.safeParse(params.env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid pipeline environment: ${formatZodIssues(parsed.error)}`);
  }
  const env = parsed.data;

  const book = params.catalog[env.NARRATION_BOOK_ID];
  if (!book) {
    const available = Object.keys(params.catalog).join(", ") || "<none>";
    throw new ConfigError(`Unknown book id "${env.NARRATION_BOOK_ID}". Available: ${available}`);
  }

  const workdir = env.NARRATION_WORKDIR ?? params.cwd ?? process.cwd();

  const config: PipelineConfig = {
    bookId: env.NARRATION_BOOK_ID,
    book,
    rateMultiplier: parseSpeechRate(book.speechRate),
    paths: buildPipelinePaths(workdir, book),
    audioConcurrency: env.NARRATION_AUDIO_CONCURRENCY,
    regenConcurrency: env.NARRATION_REGEN_CONCURRENCY,
    maxRetries: env.NARRATION_MAX_RETRIES,
    retryBaseMs: env.NARRATION_RETRY_BASE_MS,
    videoMaxWorkers: env.NARRATION_VIDEO_MAX_WORKERS ?? availableParallelism(),
    targetVideoSeconds: book.targetVideoDurationMinutes * 60,
    upload: {
      enabled: env.NARRATION_ENABLE_UPLOAD,
      uploader: env.NARRATION_UPLOADER,
      rcloneRemote: env.NARRATION_RCLONE_REMOTE,
      supabaseBucket: env.NARRATION_SUPABASE_BUCKET,
    },
    ttsProvider: env.NARRATION_TTS_PROVIDER,
    thresholds: {
      minClipSeconds: env.NARRATION_MIN_CLIP_SECONDS,
      suspectDurationRatio: env.NARRATION_SUSPECT_DURATION_RATIO,
      suspectMinBytes: env.NARRATION_SUSPECT_MIN_BYTES,
      wordsPerMinute: env.NARRATION_WORDS_PER_MINUTE,
      minVideoBytes: env.NARRATION_MIN_VIDEO_BYTES,
    },
  };

  return Object.freeze(config);
}
