import debug from 'debug';

export const NAMESPACES = {
  agents: {
    base: 'narration:agents:base',
    narrator: 'narration:agents:narrator'
  },
  llm: {
    client: 'narration:llm:client'
  },
  config: 'narration:config',
  cli: 'narration:cli'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Turn on extra namespaces from the settings file. Anything already enabled
 * through DEBUG stays enabled, and enabled names are not added twice.
 */
export function enableNamespaces(namespaces: string | undefined): void {
  if (!namespaces) return;
  const added = namespaces.split(/[\s,]+/).filter((ns) => ns !== '' && !debug.enabled(ns));
  if (added.length === 0) return;
  const current = debug.disable();
  debug.enable([current, ...added].filter((ns) => ns !== '').join(','));
}
