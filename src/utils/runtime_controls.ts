export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isVerboseLogging(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.ZOTERO_MCP_VERBOSE);
}

export function isLoggingSilenced(env: NodeJS.ProcessEnv = process.env): boolean {
  const level = String(env.ZOTERO_MCP_LOG_LEVEL ?? '').toLowerCase().trim();
  return level === 'silent' || level === 'none' || level === 'off' || level === 'quiet';
}
