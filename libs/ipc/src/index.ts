/**
 * @skillforge/ipc — Shared types and schemas for federated skill sources
 *
 * @packageDocumentation
 */

export * from './sources';
