// Caller identity -- binds each request to the ledger holder it acts for.
//
// The x-caller header is trusted: authenticating it is the job of whatever
// sits in front of this service (gateway, mTLS terminator, signed session).

import type { FastifyPluginCallback, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { CallerInvalidError, CallerMissingError } from '../errors/index.js';
import type { Holder } from '../ledger/address.js';
import { HolderSchema, isZeroAddress } from '../ledger/address.js';
import type { LedgerSession } from '../ledger/ledger.js';

export const CALLER_HEADER = 'x-caller';

/** Resolve the caller address from the request headers. */
export function callerOf(request: FastifyRequest): Holder {
  const header = request.headers[CALLER_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (value === undefined || value.length === 0) {
    throw new CallerMissingError();
  }

  const parsed = HolderSchema.safeParse(value);
  // The zero address is the mint/burn sentinel and never acts.
  if (!parsed.success || isZeroAddress(parsed.data)) {
    throw new CallerInvalidError(value);
  }
  return parsed.data;
}

const callerIdentity: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.decorateRequest('ledgerSession', function (this: FastifyRequest): LedgerSession {
    return this.server.ledger.session(callerOf(this));
  });

  done();
};

export const callerIdentityPlugin = fp(callerIdentity, {
  name: 'caller-identity',
  fastify: '5.x',
});
