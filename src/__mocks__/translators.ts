/**
 * Fake translation backends for tests. None of them reach the network.
 */

import { TranslateFn } from '../types';

export const identity: TranslateFn = async text => text;

export const uppercase: TranslateFn = async text => text.toUpperCase();

export const appendBang: TranslateFn = async text => `${text}!`;

/** Wraps every chunk in `<<` `>>` so tests can see exactly what was sent. */
export const marker: TranslateFn = async text => `<<${text}>>`;

export const failing: TranslateFn = async () => {
  throw new Error('backend unavailable');
};

/** Numbers chunks in call order: `text#1`, `text#2`, ... */
export function counting(): TranslateFn {
  let calls = 0;
  return async text => `${text}#${++calls}`;
}
