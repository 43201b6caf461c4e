import type { Key } from 'node:readline';

import type { NavigationEvent } from '../domain/navigation.js';

/**
 * Translates a decoded keypress into a navigation event.
 *
 * | Keys                      | Event             |
 * | ------------------------- | ----------------- |
 * | `q`, `ctrl+c`             | quit              |
 * | `tab`, `right`, `l`       | next-category     |
 * | `shift+tab`, `left`, `h`  | previous-category |
 * | `up`, `k` / `down`, `j`   | move-up / down    |
 * | `pageup` / `pagedown`     | page-up / down    |
 * | `enter`                   | open-detail       |
 * | `escape`                  | close-detail      |
 *
 * @param key - Key descriptor emitted by `readline.emitKeypressEvents`.
 * @returns The bound event, or `undefined` for unbound keys.
 */
export function resolveKeyEvent(key: Key | undefined): NavigationEvent | undefined {
  if (key === undefined) {
    return undefined;
  }

  if (key.ctrl === true) {
    return key.name === 'c' ? { type: 'quit' } : undefined;
  }

  switch (key.name) {
    case 'q': {
      return { type: 'quit' };
    }
    case 'tab': {
      return key.shift === true ? { type: 'previous-category' } : { type: 'next-category' };
    }
    case 'right':
    case 'l': {
      return { type: 'next-category' };
    }
    case 'left':
    case 'h': {
      return { type: 'previous-category' };
    }
    case 'up':
    case 'k': {
      return { type: 'move-up' };
    }
    case 'down':
    case 'j': {
      return { type: 'move-down' };
    }
    case 'pageup': {
      return { type: 'page-up' };
    }
    case 'pagedown': {
      return { type: 'page-down' };
    }
    case 'return':
    case 'enter': {
      return { type: 'open-detail' };
    }
    case 'escape': {
      return { type: 'close-detail' };
    }
    default: {
      return undefined;
    }
  }
}
