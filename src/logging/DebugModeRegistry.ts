/**
 * Debug Mode Registry
 *
 * Per-component log level override management.
 *
 * Components register themselves at module load (e.g., "credential-bridge",
 * "transport"). Operators can then selectively enable DEBUG/TRACE logging for
 * specific components without flooding the whole log.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component.
 * An existing override set from the environment is kept.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: existing?.levelOverride ?? defaultLevel,
  });
}

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

/**
 * Clear a component's level override, reverting to the global level.
 */
export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Effective level for a component: its override if set, otherwise the global level.
 * Child components ("transport.attempt") inherit their parent's override.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | null = name;
  while (current) {
    const registration = registry.get(current);
    if (registration?.levelOverride) {
      return registration.levelOverride;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : null;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Get all registered components with their effective levels.
 */
export function getRegisteredComponents(globalLevel: LogLevel): Array<{
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}> {
  return Array.from(registry.values())
    .map((reg) => ({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Initialize overrides from config entries like
 * ["transport", "credential-bridge:TRACE"]. A bare name means DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
