/**
 * Reversible quoting for protocol arguments. The quoted form never contains
 * a space or a newline, so one argument always fits in one space-separated
 * slot of one line.
 *
 *   &  -> &&      space -> &_      newline -> &n      leading - -> &-
 */
export function quoteArg(value: string): string {
  return value
    .replace(/&/g, '&&')
    .replace(/ /g, '&_')
    .replace(/\n/g, '&n')
    .replace(/^-/, '&-');
}

export function unquoteArg(quoted: string): string {
  return quoted.replace(/&([\s\S])/g, (_match, escaped: string) => {
    if (escaped === 'n') return '\n';
    if (escaped === '_') return ' ';
    return escaped;
  });
}
