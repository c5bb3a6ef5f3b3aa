import type Module from './module';
import type Request from './request';

// A strategy either hands back the module or says where it looked. The
// context concatenates the `searchPaths` of every strategy that missed.
export type Resolution = { type: 'found'; module: Module } | { type: 'not_found'; searchPaths: string[] };

export interface Resolver {
  readonly debugType: string;

  // Strategies must return the cached module when the context already has one
  // for the identity they found (see `Context.modules`). Minting a second
  // instance is a bug that the context refuses.
  resolveModule(request: Request): Resolution;
}
