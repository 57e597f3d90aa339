import type { HostInput, InteractionMode, PointerState } from '@shared';
import type { Vector3 } from '@shared/types';

const MODE_KEYS: Record<string, InteractionMode> = {
  Digit1: 'pan',
  Digit2: 'build',
  Digit3: 'bulldoze',
  Digit4: 'switch',
};

type Projector = (screenX: number, screenY: number) => Vector3 | null;

/**
 * Keyboard and pointer state, sampled once per frame. Left button edits the
 * rail grid, right button drags the camera.
 */
export class InputManager implements HostInput {
    private keys: { [code: string]: boolean } = {};
    private currentMode: InteractionMode = 'build';
    private dt = 0;

    private screenX = 0;
    private screenY = 0;
    private overCanvas = false;
    private leftDown = false;
    private pressPending = false;
    private releasePending = false;
    private frame: PointerState = { hit: null, down: false, pressed: false, released: false };

    private rightDown = false;
    private dragX = 0;
    private dragY = 0;
    private dragRotates = false;

    public onModeChange: ((mode: InteractionMode) => void) | null = null;

    constructor(private readonly target: HTMLElement, private readonly project: Projector) {
        window.addEventListener('keydown', (e) => this.onKey(e, true));
        window.addEventListener('keyup', (e) => this.onKey(e, false));

        target.addEventListener('pointermove', (e) => this.onMove(e));
        target.addEventListener('pointerdown', (e) => this.onButton(e, true));
        window.addEventListener('pointerup', (e) => this.onButton(e, false));
        target.addEventListener('pointerleave', () => { this.overCanvas = false; });
        target.addEventListener('contextmenu', (e) => e.preventDefault());
    }

    private onKey(event: KeyboardEvent, isPressed: boolean) {
        const oldState = this.keys[event.code];
        this.keys[event.code] = isPressed;

        // Režim jen na stisk, ne při autorepeat
        if (isPressed && !oldState) {
            const mode = MODE_KEYS[event.code];
            if (mode) this.setMode(mode);
        }
    }

    private onMove(event: PointerEvent) {
        if (this.rightDown) {
            this.dragX += event.clientX - this.screenX;
            this.dragY += event.clientY - this.screenY;
        }
        this.screenX = event.clientX;
        this.screenY = event.clientY;
        this.overCanvas = true;
    }

    private onButton(event: PointerEvent, isDown: boolean) {
        this.screenX = event.clientX;
        this.screenY = event.clientY;

        if (event.button === 2) {
            this.rightDown = isDown;
            this.dragRotates = isDown && event.altKey;
            return;
        }
        if (event.button !== 0) return;

        if (isDown && !this.leftDown) this.pressPending = true;
        if (!isDown && this.leftDown) this.releasePending = true;
        this.leftDown = isDown;
        if (isDown) this.target.setPointerCapture(event.pointerId);
    }

    setMode(mode: InteractionMode): void {
        if (mode === this.currentMode) return;
        this.currentMode = mode;
        this.onModeChange?.(mode);
    }

    /** Latch this frame's pointer state; call before the simulation step */
    beginFrame(dt: number): void {
        this.dt = dt;
        this.frame = {
            hit: this.overCanvas || this.leftDown ? this.project(this.screenX, this.screenY) : null,
            down: this.leftDown,
            pressed: this.pressPending,
            released: this.releasePending,
        };
        this.pressPending = false;
        this.releasePending = false;
    }

    deltaTime(): number {
        return this.dt;
    }

    pointer(): PointerState {
        return this.frame;
    }

    mode(): InteractionMode {
        return this.currentMode;
    }

    /** Right-drag movement since the last call, in screen pixels */
    consumeDrag(): { dx: number; dy: number; rotate: boolean } {
        const drag = { dx: this.dragX, dy: this.dragY, rotate: this.dragRotates };
        this.dragX = 0;
        this.dragY = 0;
        return drag;
    }

    get pointerScreen(): { x: number; y: number } {
        return { x: this.screenX, y: this.screenY };
    }

    isPressed(code: string): boolean {
        return this.keys[code] || false;
    }

    getAxis(positive: string, negative: string): number {
        let axis = 0;
        if (this.isPressed(positive)) axis++;
        if (this.isPressed(negative)) axis--;
        return axis;
    }
}
