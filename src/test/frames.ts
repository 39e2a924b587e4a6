const ESC = '\x1b[';

/** Rows of the bordered "hello world" screen drawn by HelloApp (title omitted). */
export function helloRows(width: number, height: number, message = 'hello world'): string[] {
  const innerWidth = width - 2;
  const rows = ['┌' + '─'.repeat(innerWidth) + '┐'];
  for (let row = 1; row < height - 1; row++) {
    const text = row === 1 ? message.slice(0, innerWidth) : '';
    rows.push('│' + text.padEnd(innerWidth, ' ') + '│');
  }
  rows.push('└' + '─'.repeat(innerWidth) + '┘');
  return rows;
}

export function frameBytes(rows: string[], clear: boolean): string {
  let out = `${ESC}?25l`;
  if (clear) out += `${ESC}2J`;
  rows.forEach((row, index) => {
    out += `${ESC}${index + 1};1H${row}`;
  });
  return out;
}

/** Splits one encoded frame back into its rows. */
export function frameRows(frame: string): string[] {
  return frame
    .split(/\x1b\[\d+;1H/)
    .slice(1);
}
