export type PlaybackCommand = 'playHighIntensity' | 'playRest' | 'pause' | 'resume' | 'stop' | 'skipNext';

/** Commands that switch the playing context rather than the transport state. */
export function isPlaylistCommand(
  command: PlaybackCommand,
): command is 'playHighIntensity' | 'playRest' {
  return command === 'playHighIntensity' || command === 'playRest';
}
