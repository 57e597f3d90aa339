// hud.ts – lišta režimů a krátká hlášení, napojené na eventBus
import { eventBus } from '@shared/eventBus';
import type { InteractionMode } from '@shared';

type HUDOptions = {
  attachTo?: HTMLElement;
  initialMode?: InteractionMode;
  onSelectMode?: (mode: InteractionMode) => void;
  messageMs?: number;             // jak dlouho zůstane hlášení (výchozí 1800 ms)
};

const MODES: ReadonlyArray<{ mode: InteractionMode; key: string; label: string }> = [
  { mode: 'pan', key: '1', label: 'Pan' },
  { mode: 'build', key: '2', label: 'Build' },
  { mode: 'bulldoze', key: '3', label: 'Bulldoze' },
  { mode: 'switch', key: '4', label: 'Switch' },
];

export class HUD {
  private root: HTMLDivElement;
  private buttons = new Map<InteractionMode, HTMLButtonElement>();
  private trainsEl: HTMLSpanElement;
  private messageEl: HTMLDivElement;
  private messageTimer: number | null = null;
  private readonly messageMs: number;

  constructor(opts: HUDOptions = {}) {
    const parent = opts.attachTo ?? document.body;
    this.messageMs = opts.messageMs ?? 1800;

    this.injectCSS();

    this.root = document.createElement('div');
    this.root.id = 'hud';
    parent.appendChild(this.root);

    // Přepínač režimů
    const bar = document.createElement('div');
    bar.className = 'hud-modes';
    MODES.forEach(({ mode, key, label }) => {
      const button = document.createElement('button');
      button.className = 'hud-mode';
      button.innerHTML = `<kbd>${key}</kbd> ${label}`;
      button.addEventListener('click', () => opts.onSelectMode?.(mode));
      bar.appendChild(button);
      this.buttons.set(mode, button);
    });
    this.root.appendChild(bar);

    // Počet vlaků
    const stats = document.createElement('div');
    stats.className = 'hud-stats';
    this.trainsEl = document.createElement('span');
    this.trainsEl.textContent = '0';
    stats.append('Trains: ', this.trainsEl);
    this.root.appendChild(stats);

    this.messageEl = document.createElement('div');
    this.messageEl.className = 'hud-message';
    this.root.appendChild(this.messageEl);

    this.setMode(opts.initialMode ?? 'build');

    eventBus.on('entityCount', (count) => {
      this.trainsEl.textContent = String(count);
    });
  }

  setMode(mode: InteractionMode): void {
    this.buttons.forEach((button, m) => button.classList.toggle('active', m === mode));
  }

  flash(text: string): void {
    this.messageEl.textContent = text;
    this.messageEl.classList.add('on');
    if (this.messageTimer !== null) window.clearTimeout(this.messageTimer);
    this.messageTimer = window.setTimeout(() => {
      this.messageEl.classList.remove('on');
      this.messageTimer = null;
    }, this.messageMs);
  }

  private injectCSS() {
    if (document.getElementById('hud-css')) return;
    const style = document.createElement('style');
    style.id = 'hud-css';
    style.textContent = `
#hud {
  position: fixed; inset: 0; pointer-events: none;
  font-family: system-ui, -apple-system, Segoe UI, Roboto, "Helvetica Neue", Arial, "Noto Sans", "Liberation Sans", sans-serif;
  color: #fff;
}
.hud-modes {
  position: fixed; left: 50%; bottom: 24px; transform: translateX(-50%);
  display: flex; gap: 6px; padding: 6px; border-radius: 10px;
  background: rgba(0,0,0,.35); backdrop-filter: blur(4px);
  pointer-events: auto;
}
.hud-mode {
  border: 0; border-radius: 6px; padding: 6px 12px;
  background: transparent; color: rgba(255,255,255,.75);
  font: inherit; font-weight: 600; cursor: pointer;
}
.hud-mode.active { background: rgba(124,255,107,.25); color: #7CFF6B; }
.hud-mode kbd { opacity: .6; font-size: 11px; margin-right: 4px; }
.hud-stats {
  position: fixed; right: 24px; bottom: 24px;
  padding: 6px 10px; border-radius: 8px; background: rgba(0,0,0,.35);
}
.hud-message {
  position: fixed; left: 50%; top: 24px; transform: translateX(-50%);
  padding: 6px 14px; border-radius: 8px; background: rgba(0,0,0,.5);
  opacity: 0; transition: opacity 0.2s ease;
}
.hud-message.on { opacity: 1; }
`;
    document.head.appendChild(style);
  }
}
