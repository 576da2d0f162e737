import { stringValue } from './builtins.js';
import { CheckerRegistry } from './registry.js';
import type { FieldPlugin } from './registry.js';

const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/** Plausible e-mail address: one `@`, no whitespace, a dotted domain. */
export const emailPlugin: FieldPlugin = {
  check(value) {
    return EMAIL.test(stringValue(value));
  },
};

/**
 * Absolute URL. A rule may restrict the scheme with a `schemes` list;
 * http and https are accepted by default.
 */
export const urlPlugin: FieldPlugin = {
  check(value, rule) {
    let url: URL;
    try {
      url = new URL(stringValue(value));
    } catch {
      return false;
    }
    const configured = rule['schemes'];
    const schemes = Array.isArray(configured)
      ? configured.map((scheme) => String(scheme))
      : ['http', 'https'];
    return schemes.includes(url.protocol.replace(/:$/, ''));
  },
};

const PHONE = /^\+?[0-9][0-9 ()/-]{4,}[0-9]$/;

/** Phone number: digits with optional leading `+` and common separators. */
export const phonePlugin: FieldPlugin = {
  check(value) {
    return PHONE.test(stringValue(value).trim());
  },
};

/** A registry holding the plugins shipped with the package. */
export function createDefaultRegistry(): CheckerRegistry {
  return new CheckerRegistry()
    .register('EMail', emailPlugin)
    .register('URL', urlPlugin)
    .register('Phone', phonePlugin);
}
