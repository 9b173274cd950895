import { ZONE_NAMES, isHeartRateZone } from '@/domain/zones/types';
import type { AnnouncerPort } from '@/ports/AnnouncerPort';
import { createLogger, type ScopedLog } from '@/shared/logging/logger';

export function announcementText(zone: number): string {
  return isHeartRateZone(zone) ? `Zone ${zone}, ${ZONE_NAMES[zone]}` : `Zone ${zone}`;
}

/**
 * Announcer for headless runs: writes the phrase a speech engine would say.
 */
export class LogAnnouncer implements AnnouncerPort {
  private readonly log: ScopedLog;

  constructor(log?: ScopedLog) {
    this.log = log ?? createLogger('Announcements', 'Speech');
  }

  public announce(zone: number): void {
    this.log.info(announcementText(zone), { zone });
  }
}
