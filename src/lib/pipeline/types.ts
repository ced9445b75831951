export type RawTranscriptSegment = {
  offset: number;
  duration: number;
  text: string;
};

export type CanonicalTranscriptSegment = {
  videoId: string;
  seq: number;
  startTime: number;
  endTime: number;
  duration: number;
  text: string;
};
