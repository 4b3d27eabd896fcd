// A `%` ends the line unless it is written as `\%`.
const LINE_COMMENT = /(?<!\\)%.*$/;

export function stripComments(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.replace(LINE_COMMENT, ''))
    .join('\n');
}
