// src/core/auth/grants/PasswordGrant.ts

import type { PasswordSettings } from '../types';
import type { TokenSet } from '../../token/types';
import { BaseGrant } from './BaseGrant';

export class PasswordGrant extends BaseGrant<PasswordSettings> {
  readonly kind = 'password';

  async acquire(): Promise<TokenSet> {
    return this.endpoint.request('acquire', {
      grant_type: 'password',
      ...this.scopeField(),
      username: this.settings.username,
      password: this.settings.password,
      ...this.authorizationDetailsField(),
    });
  }
}
