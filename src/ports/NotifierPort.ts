import type { ConnectionState } from '@/domain/connection/connectionState';
import type { TrackSnapshot } from '@/domain/tracks/types';
import type { TrainingView } from '@/domain/training/types';
import type { CoachError } from '@/shared/errors';

/**
 * Read-only state pushed to the UI collaborator. Implementations must not
 * throw; the session keeps running whatever the UI does.
 */
export interface NotifierPort {
  notifyTrainingChanged: (view: TrainingView) => void;
  notifyZoneChanged: (zone: number | null) => void;
  notifyConnectionChanged: (state: ConnectionState) => void;
  notifyTrackChanged: (track: TrackSnapshot | null) => void;
  notifyUserFacingError: (error: CoachError) => void;
  notifyReauthRequired: (reason: string) => void;
}
