export type TrackSource = 'channel' | 'requestApi' | 'optimistic';

/** Higher rank wins: live channel pushes beat polled API data beat predictions. */
export const SOURCE_RANK: Record<TrackSource, number> = {
  channel: 3,
  requestApi: 2,
  optimistic: 1,
};

export interface TrackSnapshot {
  source: TrackSource;
  sourceRank: number;
  trackId: string;
  title: string;
  artist: string;
  isPlaying: boolean;
  /** Epoch ms. */
  observedAt: number;
}

export type TrackFields = Pick<TrackSnapshot, 'trackId' | 'title' | 'artist' | 'isPlaying'>;

export function makeSnapshot(source: TrackSource, fields: TrackFields, observedAt: number): TrackSnapshot {
  return { source, sourceRank: SOURCE_RANK[source], ...fields, observedAt };
}

export function sameTrackState(left: TrackFields, right: TrackFields): boolean {
  return left.trackId === right.trackId && left.isPlaying === right.isPlaying;
}
