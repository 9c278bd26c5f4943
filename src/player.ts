import playSound from 'play-sound';

/** Plays an audio file to completion */
export interface AudioPlayer {
  play(filePath: string): Promise<void>;
}

const player = playSound();

/**
 * Play a single audio file with whichever CLI player play-sound finds
 * (afplay, mpg123, mplayer, ...). Resolves once playback ends; rejects when
 * the player fails or none is installed.
 */
export function play(filePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    player.play(filePath, (err) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(`Playback failed: ${String(err)}`));
        return;
      }
      resolve();
    });
  });
}

export const soundPlayer: AudioPlayer = { play };
