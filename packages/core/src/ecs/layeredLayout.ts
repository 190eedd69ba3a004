/**
 * packages/core/src/ecs/layeredLayout.ts — ECS layout with depth-aware collisions.
 *
 * Why: In a scene drawn in perspective, two sprites may overlap on screen
 * while standing at different depths. Each collidable entity spans the
 * z-levels from `z - depth` up to its own `z`, and every level below the top
 * is offset by `zShift`. Two entities collide only if their ranges share a
 * z-level on which their hitboxes overlap.
 */

import type { Vec2 } from "../geometry/grid.js";
import { rangesIntersect, rectanglesCollide } from "../geometry/rect.js";
import type { Widget } from "../widgets/widget.js";
import { CollisionComponent } from "./collision.js";
import { ECSLayout } from "./ecsLayout.js";
import type { Entity } from "./entity.js";
import { WidgetComponent } from "./widgetComponent.js";

/** A collidable entity's hitbox at a candidate position. */
export type Hitbox = Readonly<{
  pos: Vec2;
  z: number;
  depth: number;
  shift: Vec2;
  face: Vec2;
  faceSize: Vec2;
}>;

function hitboxOf(entity: Entity, pos: Vec2): Hitbox | null {
  const collision = entity.get(CollisionComponent);
  const widget = entity.get(WidgetComponent);
  if (collision === undefined || widget === undefined) return null;
  const [fw, fh] = collision.faceSize;
  return {
    pos,
    z: widget.zLevel,
    depth: collision.depth,
    shift: collision.zShift,
    face: collision.facePosition,
    faceSize: fw === 0 && fh === 0 ? widget.size : collision.faceSize,
  };
}

/** Hitbox corner on `zLevel`, shifted once per level below the top. */
function cornerAt(box: Hitbox, zLevel: number): Vec2 {
  const below = box.z - zLevel;
  return [box.pos[0] + box.face[0] + box.shift[0] * below, box.pos[1] + box.face[1] + box.shift[1] * below];
}

export function hitboxesCollide(a: Hitbox, b: Hitbox): boolean {
  if (!rangesIntersect(a.z - a.depth, a.z, b.z - b.depth, b.z)) return false;
  const low = Math.max(a.z - a.depth, b.z - b.depth);
  const high = Math.min(a.z, b.z);
  for (let z = low; z <= high; z++) {
    if (rectanglesCollide(cornerAt(a, z), a.faceSize, cornerAt(b, z), b.faceSize)) return true;
  }
  return false;
}

export class LayeredECSLayout extends ECSLayout {
  /** Entities without a collision component neither collide nor get collided into. */
  protected override collisionsAt(id: string, _widget: Widget, pos: Vec2): string[] {
    const mover = this.entities.get(id);
    const moverBox = mover === undefined ? null : hitboxOf(mover, pos);
    if (moverBox === null) return [];
    const found: string[] = [];
    for (const [otherId, other] of this.entities) {
      if (otherId === id) continue;
      const otherWidget = this.widgets.get(otherId);
      const otherPos = otherWidget === undefined ? undefined : this.childPosition(otherWidget);
      if (otherPos === undefined) continue;
      const otherBox = hitboxOf(other, otherPos);
      if (otherBox !== null && hitboxesCollide(moverBox, otherBox)) found.push(otherId);
    }
    return found;
  }

  protected override serialClass(): string {
    return "LayeredECSLayout";
  }
}
