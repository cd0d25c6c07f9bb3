import chalk from 'chalk';
import type { Color } from './types.js';

export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  switch (color) {
    case 'red':
      return chalk.red(text);
    case 'green':
      return chalk.green(text);
    case 'yellow':
      return chalk.yellow(text);
    case 'blue':
      return chalk.blue(text);
    case 'cyan':
      return chalk.cyan(text);
    case 'bold':
      return chalk.bold(text);
    case 'dim':
      return chalk.dim(text);
  }
}
