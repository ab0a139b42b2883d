/**
 * @fileoverview Resolution frames
 *
 * @module wirestack/domain/resolution
 */

import { ServiceType } from '../../infrastructure/reflection';
import { CircularDependencyError, ResolutionFrameError } from '../exceptions';

/**
 * Types currently being resolved by one container, outermost first.
 *
 * @remarks
 * Every `enter()` must be paired with a `leave()` on all exit paths:
 *
 * ```typescript
 * stack.enter(type);
 * try {
 *   return provide(type);
 * } finally {
 *   stack.leave(type);
 * }
 * ```
 */
export class ResolutionStack {
  private readonly active = new Set<ServiceType>();
  private readonly frames: ServiceType[] = [];

  /**
   * Push a frame for `type`.
   *
   * @throws {CircularDependencyError} If `type` already has a frame
   */
  enter(type: ServiceType): void {
    if (this.active.has(type)) {
      throw new CircularDependencyError(type, [...this.frames]);
    }
    this.active.add(type);
    this.frames.push(type);
  }

  /**
   * Pop the frame for `type`, which must be the innermost one.
   *
   * @throws {ResolutionFrameError} If `type` is not the innermost frame
   */
  leave(type: ServiceType): void {
    const innermost = this.frames[this.frames.length - 1];
    if (innermost !== type) {
      throw new ResolutionFrameError(type, innermost);
    }
    this.frames.pop();
    this.active.delete(type);
  }

  has(type: ServiceType): boolean {
    return this.active.has(type);
  }

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Active types, outermost first.
   */
  path(): readonly ServiceType[] {
    return [...this.frames];
  }
}
