export type SearchMode = 'find' | 'grep';

/** Quote one shell word for the platform's default shell. */
export function shellQuote(value: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') return `"${value.replace(/"/g, '""')}"`;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Substitute every `{dir}` placeholder in a command template with the quoted directory. */
export function renderSearchCommand(
  template: string,
  dir: string,
  platform: NodeJS.Platform = process.platform,
): string {
  return template.split('{dir}').join(shellQuote(dir, platform));
}
