// src/core/auth/grants/ClientCredentialsGrant.ts

import type { ClientCredentialsSettings } from '../types';
import type { TokenSet } from '../../token/types';
import { BaseGrant } from './BaseGrant';

/** Machine-to-machine grant: the client's own credentials are the whole grant. */
export class ClientCredentialsGrant extends BaseGrant<ClientCredentialsSettings> {
  readonly kind = 'client_credentials';

  async acquire(): Promise<TokenSet> {
    return this.endpoint.request('acquire', {
      grant_type: 'client_credentials',
      ...this.scopeField(),
      ...this.authorizationDetailsField(),
    });
  }
}
