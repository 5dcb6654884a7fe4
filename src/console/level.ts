/**
 * Level
 * Registry of simulation entities that natives can reach by id
 */

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export function vec(x: number, y: number): Vec2 {
  return { x, y };
}

export const ZERO: Vec2 = vec(0, 0);

export interface RigidRectInit {
  readonly id: string;
  readonly position?: Vec2 | undefined;
  readonly size?: Vec2 | undefined;
}

/**
 * Rigid rectangle body.
 * Forces accumulate until the simulation step takes them.
 */
export class RigidRect {
  readonly id: string;
  position: Vec2;
  size: Vec2;
  private accumulated: Vec2 = ZERO;

  constructor(init: RigidRectInit) {
    this.id = init.id;
    this.position = init.position ?? ZERO;
    this.size = init.size ?? vec(1, 1);
  }

  get force(): Vec2 {
    return this.accumulated;
  }

  applyForce(force: Vec2): void {
    this.accumulated = vec(
      this.accumulated.x + force.x,
      this.accumulated.y + force.y
    );
  }

  /** Return the accumulated force and reset it */
  takeForce(): Vec2 {
    const force = this.accumulated;
    this.accumulated = ZERO;
    return force;
  }
}

export class Level {
  private readonly rects = new Map<string, RigidRect>();

  constructor(rects: Iterable<RigidRect> = []) {
    for (const rect of rects) {
      this.addRect(rect);
    }
  }

  addRect(rect: RigidRect): void {
    if (this.rects.has(rect.id)) {
      throw new Error(`Duplicate rigid_rect id: ${rect.id}`);
    }
    this.rects.set(rect.id, rect);
  }

  rigidRect(id: string): RigidRect | undefined {
    return this.rects.get(id);
  }

  get rigidRects(): RigidRect[] {
    return [...this.rects.values()];
  }
}
