/**
 * Raised when a parameter combination cannot be realised as geometry.
 * The message is prefixed with the component that detected it, e.g.
 * "wall tracer: empty perimeter range on side front (between right and thumb)".
 */
export class ConfigurationError extends Error {
  readonly component: string;

  constructor(component: string, detail: string) {
    super(`${component}: ${detail}`);
    this.name = 'ConfigurationError';
    this.component = component;
  }
}
