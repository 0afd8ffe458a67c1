/**
 * @module subject-registry/application/registry
 * @description Subject registries
 */

export type { ISubscriberRegistry, ISubject, IAsyncSubject } from './ISubject';

export { SubjectRegistryBase } from './SubjectRegistryBase';
export { SubjectRegistry, createSubjectRegistry } from './SubjectRegistry';
export { AsyncSubjectRegistry, createAsyncSubjectRegistry } from './AsyncSubjectRegistry';
