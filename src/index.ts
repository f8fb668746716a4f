export * from './core/errors';
export * from './core/game';
export * from './core/dependency';
export * from './core/binary-cursor';
export * from './core/layout';
export * from './core/catalog';
export * from './core/decoder';
export * from './core/decoder-registry';
export * from './core/heuristic-scanner';
export * from './core/dependency-resolver';
export * from './core/dependency-graph';
export * from './core/asset-directory';
export * from './core/config';
export * from './core/logger';
export * from './core/formats/common';
export * from './core/formats/meta-animation';
export * from './core/formats/meta-transition';
export * from './core/formats/pas-database';
export * from './core/formats/evnt';
export * from './core/formats/ancs';
export * from './core/formats/cmdl';
export * from './core/formats/csng';
export * from './core/formats/dumb';
export * from './core/formats/font';
export * from './core/formats/frme';
export * from './core/formats/fsm2';
export * from './core/formats/hint';
export * from './core/formats/rule';
