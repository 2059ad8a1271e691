export * from './factories';
export * from './mocks';
