import debugFactory from 'debug';

// Enable with DEBUG=uct:* (or a single namespace)
export const iterationLog = debugFactory('uct:iteration');
export const scoreLog = debugFactory('uct:scores');
export const treeLog = debugFactory('uct:tree');
