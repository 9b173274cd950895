/**
 * Audio announcement collaborator. Speech synthesis and audio session handling
 * live behind this port.
 */
export interface AnnouncerPort {
  announce(zone: number): void;
}
