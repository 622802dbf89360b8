import { FRAGMENT_SAFE, requote } from './requote.js';

export function normalizeScheme(scheme: string): string {
  return scheme.toLowerCase();
}

/** `@` and `:@` carry no credentials and are dropped. */
export function normalizeUserinfo(userinfo: string): string {
  if (userinfo === '@' || userinfo === ':@') {
    return '';
  }
  return userinfo;
}

export function normalizeFragment(fragment: string, charset = 'utf-8'): string {
  return requote(fragment, FRAGMENT_SAFE, charset);
}
