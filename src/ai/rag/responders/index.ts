export * from './base.responder';
export * from './responder-registry';
