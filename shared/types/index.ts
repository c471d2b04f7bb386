// Central export point for all types

export * from './setting.types';
export * from './location.types';
export * from './tip.types';
export * from './weather.types';
export * from './subscription.types';
export * from './paging.types';
