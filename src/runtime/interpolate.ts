import { Environment } from './environment';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Expand `{Name}` placeholders against the environment.
 *
 * One left-to-right pass: substituted values are never rescanned, so a
 * value containing `{Other}` comes out literally. Brace text that is not
 * a placeholder (a lone `{`, `{two words}`) is left as written.
 */
export function interpolate(template: string, env: Environment): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => env.get(name));
}
