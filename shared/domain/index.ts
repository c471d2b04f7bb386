export * from './coordinate';
export * from './setting';
export * from './location';
export * from './tip';
export * from './weather';
export * from './subscription';
