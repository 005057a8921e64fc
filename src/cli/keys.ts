import { emitKeypressEvents } from 'node:readline';

import type { InputSource } from '../core/eventBus.js';
import type { AppEvent } from '../core/events.js';

/** The fields of a readline keypress the keymap looks at. */
export interface KeyPress {
  name?: string | undefined;
  ctrl?: boolean | undefined;
  shift?: boolean | undefined;
}

export function mapKey(key: KeyPress): AppEvent | undefined {
  if (key.ctrl) {
    return key.name === 'c' ? { type: 'quit' } : undefined;
  }
  switch (key.name) {
    case 'q':
    case 'escape':
      return { type: 'quit' };
    case 'down':
    case 'j':
      return { type: 'selectNext' };
    case 'up':
    case 'k':
      return { type: 'selectPrevious' };
    case 'home':
      return { type: 'selectFirst' };
    case 'end':
      return { type: 'selectLast' };
    case 'g':
      return key.shift ? { type: 'selectLast' } : { type: 'selectFirst' };
    case 'l':
      return { type: 'toggleLock' };
    case 'tab':
      return { type: 'switchSection' };
    case 'v':
      return { type: 'toggleView' };
    default:
      return undefined;
  }
}

/** Raw-mode keyboard input mapped through `mapKey`. */
export function terminalInput(stdin: NodeJS.ReadStream = process.stdin): InputSource {
  return (deliver) => {
    emitKeypressEvents(stdin);
    const raw = stdin.isTTY;
    if (raw) stdin.setRawMode(true);

    const onKeypress = (_chunk: string | undefined, key: KeyPress | undefined): void => {
      if (!key) return;
      const event = mapKey(key);
      if (event) deliver(event);
    };
    stdin.on('keypress', onKeypress);
    stdin.resume();

    return () => {
      stdin.off('keypress', onKeypress);
      if (raw) stdin.setRawMode(false);
      stdin.pause();
    };
  };
}
