// @synteny/layout - layout engine for comparative genome plots
export * from './types/layout';
export * from './errors';
export * from './registry/schema';
export * from './registry/tracks';
export * from './layout/coords';
export * from './layout/seqs';
export * from './layout/infer';
export * from './layout/genomes';
export * from './project/resolve';
export * from './project/feats';
export * from './project/links';
export * from './transform/settle';
export * from './transform/flip';
export * from './transform/pick';
export * from './transform/shift';
export * from './transform/focus';
export * from './transform/add';
export * from './accessors';
export * from './store/layoutStore';
export * from './util/log';
export * from './util/format';
export * from './util/swap';
