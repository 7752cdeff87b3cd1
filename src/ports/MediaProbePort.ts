export interface MediaProbePort {
  readonly name: string;
  /** Duration in seconds; `null` (or a rejection) when it cannot be determined. */
  probeDuration(filePath: string): Promise<number | null>;
}
