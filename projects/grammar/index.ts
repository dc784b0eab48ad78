export * from './symbols';
export * from './errors';
export * from './grammar';
export * from './grammar-text';
export * from './first-follow';
export * from './left-recursion';
export * from './LL1-table';
export * from './analysis';
export * from './LL1-parser';
export * from './format';
