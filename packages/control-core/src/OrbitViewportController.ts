import type { OrbitViewportConfig, OrbitViewportState, ViewportCommand } from "./types";

type PerspectiveCameraLike = {
  position: { set: (x: number, y: number, z: number) => void };
  lookAt: (x: number, y: number, z: number) => void;
};

const DEFAULT_CONFIG: Required<OrbitViewportConfig> = {
  radius: 40,
  minRadius: 5,
  maxRadius: 200,
  rotationSpeed: 0.005,
  zoomSpeed: 0.05,
  clampVertical: true,
};

function clampPhi(phi: number): number {
  const EPS = 1e-4;
  return Math.min(Math.max(phi, EPS), Math.PI - EPS);
}

function clampRadius(radius: number, minRadius: number, maxRadius: number): number {
  return Math.min(Math.max(radius, minRadius), maxRadius);
}

/** Spherical camera around the origin, driven by viewport commands. */
export class OrbitViewportController {
  private readonly config: Required<OrbitViewportConfig>;
  private state: OrbitViewportState;

  constructor(config?: OrbitViewportConfig) {
    this.config = { ...DEFAULT_CONFIG, ...(config ?? {}) };
    this.state = {
      radius: this.config.radius,
      theta: 0,
      phi: Math.PI / 2,
      dragging: false,
    };
  }

  handle(command: ViewportCommand): void {
    switch (command.type) {
      case "ORBIT_BEGIN":
        this.state.dragging = true;
        break;
      case "ORBIT": {
        this.state.theta -= command.dx * this.config.rotationSpeed;
        const phi = this.state.phi - command.dy * this.config.rotationSpeed;
        this.state.phi = this.config.clampVertical ? clampPhi(phi) : phi;
        break;
      }
      case "ORBIT_END":
        this.state.dragging = false;
        break;
      case "ZOOM":
        this.state.radius = clampRadius(
          this.state.radius * (1 - command.ticks * this.config.zoomSpeed),
          this.config.minRadius,
          this.config.maxRadius
        );
        break;
    }
  }

  applyToCamera(camera: PerspectiveCameraLike): void {
    const { radius, theta, phi } = this.state;
    const sinPhiRadius = Math.sin(phi) * radius;
    camera.position.set(sinPhiRadius * Math.sin(theta), Math.cos(phi) * radius, sinPhiRadius * Math.cos(theta));
    camera.lookAt(0, 0, 0);
  }

  getState(): OrbitViewportState {
    return { ...this.state };
  }
}

export { DEFAULT_CONFIG as defaultOrbitConfig };
