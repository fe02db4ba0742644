// Core interfaces and types
export type { IContainer, ServiceDescriptor, ServiceFactory, ServiceResolver } from './IContainer';
export { ServiceToken } from './IContainer';

// Container implementation
export { Container, ServiceResolutionError, unwrapResolutionError } from './Container';
