import { mat4, vec3 } from "gl-matrix";

/**
 * Camera - fly camera with yaw/pitch orientation
 *
 * Angles are radians. Yaw 0 / pitch 0 looks down -Z; positive yaw turns
 * towards +X, positive pitch towards +Y. Pitch is not clamped, so looking
 * past straight up flips the up vector.
 */
export default class Camera {
    position: vec3;
    yaw: number;
    pitch: number;

    forwards: vec3;
    right: vec3;
    up: vec3;

    aspect: number;
    fovScale: number;
    near: number;
    far: number;

    constructor(
        position: vec3,
        yaw: number,
        pitch: number,
        aspect: number,
        fovScale: number,
        near: number,
        far: number
    ) {
        this.position = vec3.clone(position);
        this.yaw = yaw;
        this.pitch = pitch;
        this.aspect = aspect;
        this.fovScale = fovScale;
        this.near = near;
        this.far = far;

        this.forwards = vec3.create();
        this.right = vec3.create();
        this.up = vec3.create();
        this.update();
    }

    /**
     * Place the camera at `eye` looking towards `target`.
     * `fovScale` is tan(fovY / 2); 1.0 gives a 90° vertical field of view.
     */
    static lookAt(
        eye: vec3,
        target: vec3,
        width: number,
        height: number,
        fovScale: number,
        near: number,
        far: number
    ): Camera {
        const direction = vec3.subtract(vec3.create(), target, eye);
        vec3.normalize(direction, direction);

        const pitch = Math.asin(Math.max(-1, Math.min(1, direction[1])));
        const yaw = Math.atan2(direction[0], -direction[2]);

        return new Camera(eye, yaw, pitch, aspectOf(width, height), fovScale, near, far);
    }

    resize(width: number, height: number): void {
        this.aspect = aspectOf(width, height);
    }

    walkForward(delta: number): void {
        vec3.scaleAndAdd(this.position, this.position, this.forwards, delta);
    }

    walkRight(delta: number): void {
        vec3.scaleAndAdd(this.position, this.position, this.right, delta);
    }

    levitateUp(delta: number): void {
        vec3.scaleAndAdd(this.position, this.position, this.up, delta);
    }

    rotateRight(delta: number): void {
        this.yaw += delta;
        this.update();
    }

    rotateUp(delta: number): void {
        this.pitch += delta;
        this.update();
    }

    getView(): mat4 {
        const target = vec3.add(vec3.create(), this.position, this.forwards);
        return mat4.lookAt(mat4.create(), this.position, target, this.up);
    }

    getProjection(): mat4 {
        const fovY = 2 * Math.atan(this.fovScale);
        return mat4.perspectiveZO(mat4.create(), fovY, this.aspect, this.near, this.far);
    }

    getViewProjection(): mat4 {
        return mat4.multiply(mat4.create(), this.getProjection(), this.getView());
    }

    // Rebuild the basis from yaw/pitch
    private update(): void {
        const cosPitch = Math.cos(this.pitch);
        vec3.set(
            this.forwards,
            cosPitch * Math.sin(this.yaw),
            Math.sin(this.pitch),
            -cosPitch * Math.cos(this.yaw)
        );
        vec3.set(this.right, Math.cos(this.yaw), 0, Math.sin(this.yaw));
        vec3.cross(this.up, this.right, this.forwards);
    }
}

function aspectOf(width: number, height: number): number {
    return Math.max(1, width) / Math.max(1, height);
}
