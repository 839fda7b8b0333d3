// ScenePanel - DOM side panel that edits a Scene between frames.
//
// Controls write into the Scene on "change" and the next buildFrame() picks
// the edit up. Adding or deleting a primitive rebuilds the panel so the
// per-primitive controls stay in step with the list indices.
//
// Inputs are named by their path in the scene ("camera.bounceCount",
// "hyperSpheres.0.radius", "hyperPlanes.1.material.baseColor").

import { vec3, vec4 } from "gl-matrix";
import type { ReadonlyVec3, ReadonlyVec4 } from "gl-matrix";
import type { Scene } from "../engine/Scene";
import type { HyperSphere, HyperCuboid, HyperPlane } from "../engine/primitives";

const DEG_TO_RAD = Math.PI / 180;

type PrimitiveKey = "hyperSpheres" | "hyperCuboids" | "hyperPlanes";

interface Named {
  name?: string;
  material: number;
}

/** "#rrggbb" for a color with channels in [0, 1]. */
export function colorToHex(color: ReadonlyVec3): string {
  const channel = (c: number) =>
    Math.round(Math.min(1, Math.max(0, c)) * 255)
      .toString(16)
      .padStart(2, "0");
  return `#${channel(color[0])}${channel(color[1])}${channel(color[2])}`;
}

/** Inverse of colorToHex; null for anything but "#rrggbb". */
export function hexToColor(hex: string): vec3 | null {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) return null;
  return vec3.fromValues(parseInt(match[1], 16) / 255, parseInt(match[2], 16) / 255, parseInt(match[3], 16) / 255);
}

function formatNumber(value: number): string {
  return String(Number(value.toPrecision(6)));
}

export class ScenePanel {
  readonly element: HTMLElement;

  private _scene: Scene;
  private _doc: Document;

  constructor(scene: Scene, root: HTMLElement) {
    this._scene = scene;
    this._doc = root.ownerDocument;
    this.element = this._doc.createElement("div");
    this.element.className = "scene-panel";
    // Typing into a field must not fly the camera.
    this.element.addEventListener("keydown", (e) => e.stopPropagation());
    this.element.addEventListener("keyup", (e) => e.stopPropagation());
    root.appendChild(this.element);
    this.rebuild();
  }

  /** Recreate every control from the current scene. */
  rebuild(): void {
    const scene = this._scene;
    this.element.replaceChildren(
      this.cameraSection(),
      this.primitiveSection("Hyper Spheres", "hyperSpheres", scene.hyperSpheres, (s, path) => this.sphereFields(s, path), {
        label: "Add Hyper Sphere",
        add: () => scene.addHyperSphere({ name: "Default Hyper Sphere", center: vec4.create(), radius: 1 }),
        remove: (i) => scene.removeHyperSphere(i),
      }),
      this.primitiveSection("Hyper Cuboids", "hyperCuboids", scene.hyperCuboids, (c, path) => this.cuboidFields(c, path), {
        label: "Add Hyper Cuboid",
        add: () =>
          scene.addHyperCuboid({
            name: "Default Hyper Cuboid",
            center: vec4.create(),
            halfExtents: vec4.fromValues(0.5, 0.5, 0.5, 0.5),
          }),
        remove: (i) => scene.removeHyperCuboid(i),
      }),
      this.primitiveSection("Hyper Planes", "hyperPlanes", scene.hyperPlanes, (p, path) => this.planeFields(p, path), {
        label: "Add Hyper Plane",
        add: () =>
          scene.addHyperPlane({ name: "Default Hyper Plane", point: vec4.create(), normal: vec4.fromValues(0, 1, 0, 0) }),
        remove: (i) => scene.removeHyperPlane(i),
      }),
    );
  }

  // ---------------------------------------------------------------------------
  // Sections
  // ---------------------------------------------------------------------------

  private cameraSection(): HTMLElement {
    const camera = this._scene.camera;
    return this.section("Camera", [
      this.numberField("Fov", "camera.fov", camera.fov / DEG_TO_RAD, (degrees) => {
        const clamped = Math.min(179, Math.max(1, degrees));
        camera.fov = clamped * DEG_TO_RAD;
        return clamped;
      }),
      this.numberField("Min Distance", "camera.minDistance", camera.minDistance, (v) => {
        camera.minDistance = Math.max(0, v);
        camera.maxDistance = Math.max(camera.maxDistance, camera.minDistance);
        return camera.minDistance;
      }),
      this.numberField("Max Distance", "camera.maxDistance", camera.maxDistance, (v) => {
        camera.maxDistance = Math.max(camera.minDistance, v);
        return camera.maxDistance;
      }),
      this.numberField("Max Bounces", "camera.bounceCount", camera.bounceCount, (v) => {
        camera.bounceCount = Math.max(1, Math.round(v));
        return camera.bounceCount;
      }),
      this.numberField("Sample Count", "camera.sampleCount", camera.sampleCount, (v) => {
        camera.sampleCount = Math.max(1, Math.round(v));
        return camera.sampleCount;
      }),
    ]);
  }

  private primitiveSection<T extends Named>(
    title: string,
    key: PrimitiveKey,
    items: T[],
    fields: (item: T, path: string) => HTMLElement[],
    actions: { label: string; add: () => void; remove: (index: number) => void },
  ): HTMLElement {
    const rows = items.map((item, index) => {
      const path = `${key}.${index}`;
      const fieldset = this._doc.createElement("fieldset");
      const legend = this._doc.createElement("legend");
      legend.textContent = item.name ?? `${title} ${index}`;
      fieldset.appendChild(legend);

      const name = this.input("text", `${path}.name`, item.name ?? "");
      name.addEventListener("change", () => {
        item.name = name.value;
        legend.textContent = name.value;
      });
      fieldset.appendChild(this.row("Name", name));

      for (const field of fields(item, path)) fieldset.appendChild(field);
      fieldset.appendChild(this.materialSection(item.material, `${path}.material`));

      const remove = this.button("Delete", `${path}.delete`, () => actions.remove(index));
      fieldset.appendChild(remove);
      return fieldset;
    });

    const add = this.button(actions.label, `${key}.add`, actions.add);
    return this.section(title, [add, ...rows]);
  }

  private sphereFields(sphere: HyperSphere, path: string): HTMLElement[] {
    return [
      this.vec4Field("Center", `${path}.center`, () => sphere.center, (v) => {
        sphere.center = v;
      }),
      this.numberField("Radius", `${path}.radius`, sphere.radius, (v) => {
        if (v > 0) sphere.radius = v;
        return sphere.radius;
      }),
    ];
  }

  private cuboidFields(cuboid: HyperCuboid, path: string): HTMLElement[] {
    return [
      this.vec4Field("Center", `${path}.center`, () => cuboid.center, (v) => {
        cuboid.center = v;
      }),
      this.vec4Field("Half Extents", `${path}.halfExtents`, () => cuboid.halfExtents, (v) => {
        if (Array.from(v).every((c) => c > 0)) cuboid.halfExtents = v;
      }),
    ];
  }

  private planeFields(plane: HyperPlane, path: string): HTMLElement[] {
    return [
      this.vec4Field("Point", `${path}.point`, () => plane.point, (v) => {
        plane.point = v;
      }),
      this.vec4Field("Normal", `${path}.normal`, () => plane.normal, (v) => {
        if (vec4.squaredLength(v) > 0) plane.normal = vec4.normalize(v, v);
      }),
    ];
  }

  private materialSection(index: number, path: string): HTMLElement {
    const material = this._scene.materials[index];
    if (!material) {
      const missing = this._doc.createElement("p");
      missing.textContent = `Material ${index} does not exist`;
      return missing;
    }

    const colorField = (label: string, name: string, get: () => ReadonlyVec3, set: (color: vec3) => void) => {
      const input = this.input("color", name, colorToHex(get()));
      input.addEventListener("change", () => {
        const color = hexToColor(input.value);
        if (color) set(color);
        input.value = colorToHex(get());
      });
      return this.row(label, input);
    };

    const details = this._doc.createElement("details");
    const summary = this._doc.createElement("summary");
    summary.textContent = `Material ${index}`;
    details.append(
      summary,
      colorField("Base Color", `${path}.baseColor`, () => material.baseColor, (c) => {
        material.baseColor = c;
      }),
      colorField("Emissive Color", `${path}.emissiveColor`, () => material.emissiveColor, (c) => {
        material.emissiveColor = c;
      }),
      this.numberField("Emissive Strength", `${path}.emissionStrength`, material.emissionStrength, (v) => {
        material.emissionStrength = Math.max(0, v);
        return material.emissionStrength;
      }),
    );
    return details;
  }

  // ---------------------------------------------------------------------------
  // Controls
  // ---------------------------------------------------------------------------

  private section(title: string, children: HTMLElement[]): HTMLElement {
    const details = this._doc.createElement("details");
    details.open = true;
    const summary = this._doc.createElement("summary");
    summary.textContent = title;
    details.append(summary, ...children);
    return details;
  }

  private row(label: string, ...inputs: HTMLElement[]): HTMLElement {
    const element = this._doc.createElement("label");
    element.append(`${label}: `, ...inputs);
    return element;
  }

  private input(type: string, name: string, value: string): HTMLInputElement {
    const input = this._doc.createElement("input");
    input.type = type;
    input.name = name;
    input.value = value;
    return input;
  }

  private button(label: string, name: string, onClick: () => void): HTMLButtonElement {
    const button = this._doc.createElement("button");
    button.type = "button";
    button.name = name;
    button.textContent = label;
    button.addEventListener("click", () => {
      onClick();
      this.rebuild();
    });
    return button;
  }

  /**
   * A number input. `apply` stores the parsed value and returns what was
   * actually kept, which the input then shows. Unparseable text is reverted.
   */
  private numberField(label: string, name: string, value: number, apply: (value: number) => number): HTMLElement {
    let current = value;
    const input = this.input("number", name, formatNumber(value));
    input.step = "any";
    input.addEventListener("change", () => {
      const parsed = Number(input.value);
      if (input.value.trim() !== "" && Number.isFinite(parsed)) {
        current = apply(parsed);
      }
      input.value = formatNumber(current);
    });
    return this.row(label, input);
  }

  /** Four number inputs; `set` receives a fresh vector and may decline it. */
  private vec4Field(label: string, name: string, get: () => ReadonlyVec4, set: (value: vec4) => void): HTMLElement {
    const inputs = [0, 1, 2, 3].map((i) => {
      const input = this.input("number", `${name}.${i}`, formatNumber(get()[i]));
      input.step = "any";
      return input;
    });
    const refresh = () => {
      const current = get();
      inputs.forEach((input, i) => {
        input.value = formatNumber(current[i]);
      });
    };
    inputs.forEach((input, i) => {
      input.addEventListener("change", () => {
        const parsed = Number(input.value);
        if (input.value.trim() !== "" && Number.isFinite(parsed)) {
          const next = vec4.clone(get());
          next[i] = parsed;
          set(next);
        }
        refresh();
      });
    });
    return this.row(label, ...inputs);
  }
}
