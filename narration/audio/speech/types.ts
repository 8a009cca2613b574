export type SynthesisRequest = {
  chapter: number;
  text: string;
  voice: string;
  /** Signed percentage, e.g. "+15%". */
  rate: string;
  /** Where the MP3 must be written. The caller owns renaming it into place. */
  outputPath: string;
};

export interface SpeechSynthesizer {
  name: string;

  /**
   * Write one MP3 for the request. Rejects on any service or transport
   * failure; a resolved call says nothing about whether the audio is complete.
   */
  synthesize(request: SynthesisRequest): Promise<void>;
}
