export type StreamName = 'stdout' | 'stderr';

export interface OutputLine {
  timestamp: Date;
  stream: StreamName;
  text: string;
}
