// Azure neural TTS over REST (MP3). Same voice names and rate syntax as edge-tts.
// One request returns at most 10 minutes of audio, so chapters are sent in
// sentence-aligned chunks and the MP3 frames are joined in order.

import { writeFile } from "node:fs/promises";
import { ConfigError, TransientSynthesisError } from "../../lib/errors.js";
import type { SpeechSynthesizer, SynthesisRequest } from "./types.js";

export const AZURE_OUTPUT_FORMAT = "audio-24khz-48kbitrate-mono-mp3";

// ~650 words: under 10 minutes even at half speed.
export const AZURE_MAX_CHUNK_CHARS = 4000;

function requireEnv(env: Record<string, string | undefined>, name: string): string {
  const v = env[name];
  if (!v) throw new ConfigError(`Missing env var: ${name}`);
  return v;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function buildSsml(params: { text: string; voice: string; rate: string }): string {
  // "en-US-AndrewNeural" -> xml:lang "en-US"
  const lang = params.voice.split("-").slice(0, 2).join("-");
  return (
    `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${lang}">` +
    `<voice name="${escapeXml(params.voice)}">` +
    `<prosody rate="${escapeXml(params.rate)}">${escapeXml(params.text)}</prosody>` +
    `</voice></speak>`
  );
}

function splitLongSentence(sentence: string, maxChars: number): string[] {
  const out: string[] = [];
  let current = "";
  for (const word of sentence.split(/\s+/).filter(Boolean)) {
    if (current && current.length + 1 + word.length > maxChars) {
      out.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) out.push(current);
  return out;
}

/**
 * Split text into chunks of at most `maxChars`, breaking after sentence ends
 * where possible and between words otherwise. Chunks keep text order.
 */
export function splitForSynthesis(text: string, maxChars = AZURE_MAX_CHUNK_CHARS): string[] {
  const sentences = (text.match(/[^.!?]+(?:[.!?]+["'\u201d\u2019)\]]*|$)/g) ?? [])
    .map((s) => s.replace(/\s+/g, " ").trim())
    .filter(Boolean);

  const chunks: string[] = [];
  let current = "";
  for (const sentence of sentences) {
    const pieces = sentence.length > maxChars ? splitLongSentence(sentence, maxChars) : [sentence];
    for (const piece of pieces) {
      if (current && current.length + 1 + piece.length > maxChars) {
        chunks.push(current);
        current = piece;
      } else {
        current = current ? `${current} ${piece}` : piece;
      }
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export class AzureSpeechSynthesizer implements SpeechSynthesizer {
  name = "azure";
  private readonly apiKey: string;
  private readonly region: string;

  constructor(
    env: Record<string, string | undefined>,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly maxChunkChars: number = AZURE_MAX_CHUNK_CHARS
  ) {
    this.apiKey = requireEnv(env, "AZURE_SPEECH_KEY");
    this.region = requireEnv(env, "AZURE_SPEECH_REGION");
  }

  async synthesize(request: SynthesisRequest): Promise<void> {
    const chunks = splitForSynthesis(request.text, this.maxChunkChars);
    if (chunks.length === 0) {
      throw new TransientSynthesisError(request.chapter, "Azure TTS got no text to speak", "tts_empty_output");
    }

    const parts: Buffer[] = [];
    for (const chunk of chunks) {
      parts.push(await this.synthesizeChunk(request, chunk));
    }
    await writeFile(request.outputPath, Buffer.concat(parts));
  }

  private async synthesizeChunk(request: SynthesisRequest, text: string): Promise<Buffer> {
    const url = `https://${encodeURIComponent(this.region)}.tts.speech.microsoft.com/cognitiveservices/v1`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Ocp-Apim-Subscription-Key": this.apiKey,
          "Content-Type": "application/ssml+xml",
          "X-Microsoft-OutputFormat": AZURE_OUTPUT_FORMAT,
          "User-Agent": "chapter-narration-pipeline",
        },
        body: buildSsml({ text, voice: request.voice, rate: request.rate }),
      });
    } catch (e) {
      throw new TransientSynthesisError(
        request.chapter,
        `Azure TTS fetch failed: ${e instanceof Error ? e.message : String(e)}`,
        "tts_network"
      );
    }

    if (!res.ok) {
      const errText = await res.text().catch(() => "");
      throw new TransientSynthesisError(
        request.chapter,
        `Azure TTS failed (${res.status}): ${errText.slice(0, 500)}`,
        res.status === 429 ? "tts_rate_limited" : "tts_error"
      );
    }

    const buf = await res.arrayBuffer();
    if (buf.byteLength === 0) {
      throw new TransientSynthesisError(request.chapter, "Azure TTS returned empty audio", "tts_empty_output");
    }
    return Buffer.from(buf);
  }
}
