import readline from 'node:readline';
import { readEnvironmentOverrides } from '@/config/environment';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

/**
 * Headless entry point. Reads one BPM integer per stdin line; a few plain-word
 * commands drive the session for manual runs.
 */
const log = createLogger('Server');
const runtime = createRuntime({ config: { env: readEnvironmentOverrides() } });
const input = readline.createInterface({ input: process.stdin, terminal: false });

function handleLine(line: string): void {
  const text = line.trim();
  if (text.length === 0) return;
  const { session } = runtime;

  if (/^\d+$/.test(text)) {
    session.ingestBpm(Number.parseInt(text, 10));
    return;
  }
  switch (text.toLowerCase()) {
    case 'interval':
      session.startInterval();
      return;
    case 'free':
      session.startFree();
      return;
    case 'pause':
      session.pause();
      return;
    case 'resume':
      session.resume();
      return;
    case 'stop':
      session.stop();
      return;
    case 'skip':
      session.skipTrack();
      return;
    case 'playlists':
      void bestEffort(
        async () => {
          const page = await session.listPlaylists();
          for (const playlist of page.items) {
            log.info('playlist', { name: playlist.name, uri: playlist.uri, tracks: playlist.trackCount });
          }
        },
        { fallback: undefined, onError: 'warn', label: 'playlist listing failed', log },
      );
      return;
    case 'background':
      session.setForeground(false);
      return;
    case 'foreground':
      session.setForeground(true);
      return;
    default:
      log.warn('unrecognized input line', { line: text });
  }
}

runtime
  .start()
  .then(() => {
    const shutdown = registerShutdownHandlers(runtime, { beforeStop: () => input.close() });
    input.on('line', (line) => {
      try {
        handleLine(line);
      } catch (error) {
        log.warn('input line rejected', { message: errorMessage(error) });
      }
    });
    input.once('close', () => {
      void shutdown();
    });
  })
  .catch((error) => {
    log.error('fatal bootstrap error', { message: errorMessage(error) });
    process.exit(1);
  });
