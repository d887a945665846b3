export interface NormalizerPort {
  /** Returns the model's reply verbatim; callers must validate it. */
  normalize(rawText: string, cardLabel: string): Promise<string>;
}
