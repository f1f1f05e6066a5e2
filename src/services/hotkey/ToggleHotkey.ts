import { GlobalKeyboardListener, IGlobalKeyListener } from 'node-global-key-listener';
import { FatalStartupError, errorDetail } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { ToggleEvent } from '../../types';
import { AsyncQueue } from '../../util/AsyncQueue';

/** One required key of a combo; any of `keys` satisfies it. */
export interface HotkeySlot {
  token: string;
  keys: string[];
}

export interface ParsedHotkey {
  source: string;
  slots: HotkeySlot[];
}

export type KeyboardListener = Pick<GlobalKeyboardListener, 'addListener' | 'removeListener' | 'kill'>;

const MODIFIER_ALIASES: Record<string, string[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  super: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL']
};

const SPECIAL_KEY_ALIASES: Record<string, string> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE'
};

const normalizeMainKeyToken = (token: string): string | undefined => {
  if (/^[a-z]$/i.test(token)) {
    return token.toUpperCase();
  }

  if (/^[0-9]$/.test(token)) {
    return token;
  }

  if (/^f([1-9]|1[0-9]|2[0-4])$/i.test(token)) {
    return token.toUpperCase();
  }

  return undefined;
};

export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new Error('Hotkey must name at least one key');
  }

  const slots: HotkeySlot[] = [];
  const seen = new Set<string>();

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    if (seen.has(normalized)) {
      throw new Error(`Duplicate hotkey token '${token}' in ${accelerator}`);
    }
    seen.add(normalized);

    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      slots.push({ token, keys: modifierGroup });
      continue;
    }

    const key = SPECIAL_KEY_ALIASES[normalized] ?? normalizeMainKeyToken(token);
    if (!key) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    slots.push({ token, keys: [key] });
  }

  return { source: accelerator, slots };
};

/**
 * Tracks held keys and decides when a key-down edge completes the combo.
 *
 * The held set must match the combo exactly: one key per slot and nothing else.
 * A key-down for a key that is already held is auto-repeat and never emits.
 */
export class ComboTracker {
  private readonly held = new Set<string>();
  private lastToggleAtMs = Number.NEGATIVE_INFINITY;

  public constructor(
    private readonly hotkey: ParsedHotkey,
    private readonly cooldownMs: number
  ) {}

  public handleKeyDown(key: string, nowMs: number): boolean {
    if (this.held.has(key)) {
      return false;
    }

    this.held.add(key);

    if (!this.matches()) {
      return false;
    }

    if (nowMs - this.lastToggleAtMs < this.cooldownMs) {
      return false;
    }

    this.lastToggleAtMs = nowMs;
    return true;
  }

  public handleKeyUp(key: string): void {
    this.held.delete(key);
  }

  public heldKeys(): string[] {
    return Array.from(this.held);
  }

  public reset(): void {
    this.held.clear();
  }

  private matches(): boolean {
    const { slots } = this.hotkey;
    if (this.held.size !== slots.length) {
      return false;
    }

    const used = new Set<string>();
    for (const slot of slots) {
      const key = slot.keys.find((candidate) => this.held.has(candidate) && !used.has(candidate));
      if (!key) {
        return false;
      }
      used.add(key);
    }

    return true;
  }
}

export class ToggleHotkey {
  private readonly parsedHotkey: ParsedHotkey;
  private readonly tracker: ComboTracker;
  private readonly handler: IGlobalKeyListener;
  private readonly queue = new AsyncQueue<ToggleEvent>();
  private listening = false;

  public constructor(
    accelerator: string,
    cooldownMs: number,
    private readonly logger?: StructuredLogger,
    private readonly listener: KeyboardListener = new GlobalKeyboardListener(),
    private readonly now: () => number = Date.now
  ) {
    this.parsedHotkey = parseHotkey(accelerator);
    this.tracker = new ComboTracker(this.parsedHotkey, cooldownMs);

    this.handler = (event) => {
      this.handleKey(event.name, event.state);
      return false;
    };
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    try {
      await this.listener.addListener(this.handler);
    } catch (error) {
      throw new FatalStartupError(
        `Unable to attach the global keyboard listener: ${errorDetail(error)}`,
        { cause: error }
      );
    }

    this.listening = true;
    this.logger?.info('Toggle hotkey listener started', {
      hotkey: this.describeBinding()
    });
  }

  public stop(): void {
    if (this.listening) {
      this.listener.removeListener(this.handler);
    }

    this.listener.kill();
    this.listening = false;
    this.tracker.reset();
    this.queue.end();

    this.logger?.info('Toggle hotkey listener stopped');
  }

  /** Toggle sequence; ends when the listener is stopped. */
  public events(): AsyncIterable<ToggleEvent> {
    return this.queue;
  }

  public handleKey(name: string | undefined, state: 'DOWN' | 'UP'): void {
    if (!name) {
      return;
    }

    if (state === 'UP') {
      this.tracker.handleKeyUp(name);
      return;
    }

    const at = this.now();
    if (this.tracker.handleKeyDown(name, at)) {
      this.logger?.debug('Toggle hotkey fired', { hotkey: this.describeBinding() });
      this.queue.push({ at });
    }
  }
}
