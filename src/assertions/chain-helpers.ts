/**
 * API Assert - Chain Helpers
 *
 * enterOp() starts one check on an assertion object. Once anything on the
 * object has failed, the entered chain starts failed, so the check and every
 * object it returns are no-ops.
 *
 * runPredicate() runs a predicate for one element on an isolated chain. Failures
 * inside it are reported with 'log' severity and reject the element; they
 * never reach the caller's chain.
 */

import type { Chain } from '../core/chain';

export function enterOp(chain: Chain, name: string, ...args: unknown[]): Chain {
  const opChain = chain.enter(name, ...args);
  if (chain.treeFailed()) {
    opChain.setFailed();
  }
  return opChain;
}

export function runPredicate(
  opChain: Chain,
  segment: string,
  arg: unknown,
  predicate: (chain: Chain) => boolean
): boolean {
  const chain = opChain.clone();
  chain.setRoot();
  chain.setSeverity('log');

  let failed = false;
  chain.setFailCallback(() => {
    failed = true;
  });
  chain.replace(segment, arg);

  const matched = predicate(chain);

  return matched && !failed && !chain.treeFailed();
}

/**
 * Create a plain clone for one element whose failures propagate as usual
 */
export function elementChain(opChain: Chain, segment: string, arg: unknown): Chain {
  const chain = opChain.clone();
  chain.replace(segment, arg);
  return chain;
}
