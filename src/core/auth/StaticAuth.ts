// src/core/auth/StaticAuth.ts

import type { AuthProvider } from './types';

/** Fixed bearer token. A 401 cannot be fixed by retrying. */
export class StaticBearerAuth implements AuthProvider {
  constructor(private token: string) {}

  async getHeader(): Promise<string> {
    return `Bearer ${this.token}`;
  }

  async invalidate(): Promise<boolean> {
    return false;
  }
}

export class BasicAuth implements AuthProvider {
  private header: string;

  constructor(username: string, password: string) {
    this.header = `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
  }

  async getHeader(): Promise<string> {
    return this.header;
  }

  async invalidate(): Promise<boolean> {
    return false;
  }
}
