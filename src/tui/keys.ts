import type { Key } from 'node:readline';
import type { KeyName } from './state';

export function toKeyName(text: string | undefined, key: Key | undefined): KeyName {
  if (key?.ctrl && key.name === 'c') return 'quit';

  const name = key?.name;
  switch (name) {
    case 'up':
    case 'down':
    case 'left':
    case 'right':
    case 'tab':
      return name;
    case 'escape':
      return 'cancel';
  }

  switch ((text ?? '').toLowerCase()) {
    case 's':
      return 'start';
    case 'r':
      return 'refresh';
    case 'q':
      return 'quit';
    case 'c':
      return 'cancel';
    default:
      return 'other';
  }
}
