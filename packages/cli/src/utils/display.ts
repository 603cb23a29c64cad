/**
 * Minimal terminal display helpers
 */
import colors from 'ansi-colors';

const PREVIEW_LENGTH = 50;

export function showTitle(title: string): void {
  console.log();
  console.log(colors.bold(title));
  console.log(colors.gray('─'.repeat(title.length)));
}

/**
 * Print aligned `Key: value` lines
 */
export function showProperties(properties: Record<string, string>): void {
  const width = Math.max(...Object.keys(properties).map(key => key.length));

  for (const [key, value] of Object.entries(properties)) {
    console.log(`${colors.gray(`${key}:`.padEnd(width + 1))} ${value}`);
  }
}

/**
 * Print a numbered list, one item per line
 */
export function showNumberedList(items: string[]): void {
  items.forEach((item, index) => {
    console.log(`  ${index + 1}. ${item}`);
  });
}

/**
 * Shorten text for single-line previews
 */
export function preview(text: string, length = PREVIEW_LENGTH): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  return singleLine.length > length
    ? `${singleLine.slice(0, length)}...`
    : singleLine;
}
