export * from './core';
export * from './communications';
export * from './families';
export * from './groups';
export * from './membership-types';
export * from './permissions';
export * from './finance';
export * from './volunteers';
export * from './audit';
