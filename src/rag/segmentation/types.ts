export type SegmentationMode = "sentence" | "paragraph";

export interface SplitStrategy {
  readonly name: SegmentationMode;
  split(text: string): string[];
}
