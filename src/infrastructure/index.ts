/**
 * Infrastructure Layer - I/O and Side Effects
 *
 * Implementations of the domain repository interfaces. The wallet engine
 * itself is supplied by the host application.
 */

export * from './storage'
