import type { AuthDecorator } from './types.js';

export type TokenSource = string | (() => string | Promise<string>);

/**
 * Sets `Authorization: Bearer <token>`. A function source is called on every
 * attempt, so a rotated token is picked up by the next retry.
 */
export function bearerAuth(token: TokenSource): AuthDecorator {
  return async (request) => {
    const value = typeof token === 'function' ? await token() : token;
    request.headers.set('Authorization', `Bearer ${value}`);
  };
}

export function basicAuth(username: string, password: string): AuthDecorator {
  const credentials = Buffer.from(`${username}:${password}`).toString('base64');
  return (request) => {
    request.headers.set('Authorization', `Basic ${credentials}`);
  };
}

export function headerAuth(name: string, value: string): AuthDecorator {
  return (request) => {
    request.headers.set(name, value);
  };
}
