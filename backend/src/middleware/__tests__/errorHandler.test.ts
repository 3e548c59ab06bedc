import { describe, it, expect } from '@jest/globals';
import { EngineError } from '../../engines';
import { acceptOfferBody, grantGiftBody, offerParams, reallocateBody, setupBody } from '../../validation/schemas';
import { HttpError, statusForFailure } from '../errorHandler';
import { parseInput } from '../validate';

describe('statusForFailure', () => {
  it('maps engine failures onto HTTP statuses', () => {
    const status = (code: ConstructorParameters<typeof EngineError>[0]) =>
      statusForFailure(new EngineError(code, 'x').toFailure());

    expect(status('OfferNotFound')).toBe(404);
    expect(status('TeamNotFound')).toBe(404);
    expect(status('InvalidQuantity')).toBe(400);
    expect(status('SelfTrade')).toBe(400);
    expect(status('NotOwner')).toBe(403);
    expect(status('AdminOnly')).toBe(403);
    expect(status('InsufficientFunds')).toBe(409);
    expect(status('OfferNotOpen')).toBe(409);
    expect(status('GameNotRunning')).toBe(409);
  });
});

describe('HttpError', () => {
  it('derives its code from the status', () => {
    expect(new HttpError(404, 'gone').code).toBe('NOT_FOUND');
    expect(new HttpError(418, 'teapot').code).toBe('INTERNAL_ERROR');
    expect(new HttpError(400, 'bad', 'CONFLICT').code).toBe('CONFLICT');
  });
});

function statusAndMessage(run: () => unknown): [number, string] {
  try {
    run();
  } catch (error) {
    if (error instanceof HttpError) return [error.statusCode, error.message];
    throw error;
  }
  throw new Error('expected a validation error');
}

describe('parseInput', () => {
  it('returns the parsed value', () => {
    expect(parseInput(acceptOfferBody, { quantity: 3 })).toEqual({ quantity: 3 });
    expect(parseInput(reallocateBody, undefined)).toEqual({});
  });

  it('turns schema mismatches into a 400', () => {
    try {
      parseInput(acceptOfferBody, { quantity: 'three' });
      throw new Error('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(HttpError);
      if (error instanceof HttpError) {
        expect(error.statusCode).toBe(400);
        expect(error.message).toBe('Validation error: quantity: Expected number, received string');
      }
    }
  });

  it('only accepts UUIDs as ids', () => {
    const offerId = '6f1c2a9e-3b4d-4e5f-8a7b-9c0d1e2f3a4b';
    expect(parseInput(offerParams, { offerId })).toEqual({ offerId });

    const failure = statusAndMessage(() => parseInput(offerParams, { offerId: 'abc' }));
    expect(failure).toEqual([400, 'Validation error: offerId: Invalid uuid']);
  });

  it('refuses numbers outside the safe integer range', () => {
    const team_id = '00000000-0000-4000-8000-000000000000';
    expect(parseInput(grantGiftBody, { team_id, quantity: 5 })).toEqual({ team_id, quantity: 5 });

    const failure = statusAndMessage(() => parseInput(grantGiftBody, { team_id, quantity: 1e300 }));
    expect(failure[0]).toBe(400);
  });

  it('accepts both forms of team setup', () => {
    expect(parseInput(setupBody, { roster: 'default', password: 'test-secret' })).toEqual({
      roster: 'default',
      password: 'test-secret',
    });
    expect(
      parseInput(setupBody, {
        teams: [{ name: ' India Cement ', username: 'india', industry: 'Cement', password: 'test-secret' }],
      })
    ).toEqual({
      teams: [{ name: 'India Cement', username: 'india', industry: 'Cement', password: 'test-secret' }],
    });
  });
});
