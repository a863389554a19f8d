/**
 * Raw terminal input → structured events
 *
 * A raw stdin chunk can hold several keys (fast typing, paste, key repeat),
 * so parseInput tokenises the whole chunk. Key names follow DOM
 * KeyboardEvent.key values so the same names work under xterm.js.
 */

export interface KeyInputEvent {
  kind: 'key';
  key: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export type MouseAction = 'press' | 'release' | 'drag' | 'scroll';

export interface MouseInputEvent {
  kind: 'mouse';
  action: MouseAction;
  button: number;
  col: number;
  row: number;
}

export interface ResizeInputEvent {
  kind: 'resize';
  cols: number;
  rows: number;
}

export interface UnknownInputEvent {
  kind: 'unknown';
  sequence: string;
}

export type InputEvent = KeyInputEvent | MouseInputEvent | ResizeInputEvent | UnknownInputEvent;

/** Final byte of a CSI sequence → key name */
const CSI_KEYS: Record<string, string> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
  H: 'Home',
  F: 'End',
};

/** `ESC [ n ~` sequences */
const TILDE_KEYS: Record<string, string> = {
  '1': 'Home',
  '2': 'Insert',
  '3': 'Delete',
  '4': 'End',
  '5': 'PageUp',
  '6': 'PageDown',
};

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;

export function keyEvent(key: string, modifiers: Partial<Omit<KeyInputEvent, 'kind' | 'key'>> = {}): KeyInputEvent {
  return {
    kind: 'key',
    key,
    ctrl: modifiers.ctrl ?? false,
    alt: modifiers.alt ?? false,
    shift: modifiers.shift ?? false,
  };
}

/**
 * xterm modifier parameter: value - 1 is a bitmask of shift(1), alt(2), ctrl(4)
 */
function modifiersFromParam(param: string | undefined) {
  const bits = param ? Math.max(0, Number(param) - 1) : 0;
  return {
    shift: (bits & 1) !== 0,
    alt: (bits & 2) !== 0,
    ctrl: (bits & 4) !== 0,
  };
}

function parseMouse(match: RegExpExecArray): MouseInputEvent {
  const code = Number(match[1]);
  const released = match[4] === 'm';
  let action: MouseAction = released ? 'release' : 'press';
  if (code & 64) {
    action = 'scroll';
  } else if (code & 32) {
    action = 'drag';
  }
  return {
    kind: 'mouse',
    action,
    button: code & 3,
    col: Number(match[2]) - 1,
    row: Number(match[3]) - 1,
  };
}

function parseSingleChar(ch: string, alt: boolean): KeyInputEvent {
  if (ch === '\r' || ch === '\n') return keyEvent('Enter', { alt });
  if (ch === '\t') return keyEvent('Tab', { alt });
  if (ch === '\x7f' || ch === '\b') return keyEvent('Backspace', { alt });
  if (ch === ' ') return keyEvent(' ', { alt });

  const code = ch.charCodeAt(0);
  if (code >= 1 && code <= 26) {
    return keyEvent(String.fromCharCode(code + 96), { ctrl: true, alt });
  }
  const shift = ch !== ch.toLowerCase();
  return keyEvent(ch, { alt, shift });
}

/**
 * Read one escape sequence starting at `start` (which holds ESC).
 * Returns the event and the number of characters consumed.
 */
function parseEscape(data: string, start: number): { event: InputEvent; length: number } {
  const rest = data.slice(start);

  const mouse = SGR_MOUSE.exec(rest);
  if (mouse) {
    return { event: parseMouse(mouse), length: mouse[0].length };
  }

  const introducer = rest[1];
  if (introducer === undefined) {
    return { event: keyEvent('Escape'), length: 1 };
  }

  if (introducer === 'O' && rest.length < 3) {
    return { event: { kind: 'unknown', sequence: rest }, length: rest.length };
  }

  if (introducer === 'O') {
    const key = CSI_KEYS[rest[2]];
    const sequence = rest.slice(0, 3);
    return { event: key ? keyEvent(key) : { kind: 'unknown', sequence }, length: 3 };
  }

  if (introducer === '[') {
    // Parameters are 0x30–0x3f, the final byte 0x40–0x7e
    let end = 2;
    while (end < rest.length && /[0-9;?<>=:]/.test(rest[end])) end++;
    if (end >= rest.length) {
      return { event: { kind: 'unknown', sequence: rest }, length: rest.length };
    }
    const params = rest.slice(2, end).split(';');
    const final = rest[end];
    const sequence = rest.slice(0, end + 1);

    if (final === '~') {
      const key = TILDE_KEYS[params[0]];
      const event: InputEvent = key ? keyEvent(key, modifiersFromParam(params[1])) : { kind: 'unknown', sequence };
      return { event, length: sequence.length };
    }
    const key = CSI_KEYS[final];
    const event: InputEvent = key ? keyEvent(key, modifiersFromParam(params[1])) : { kind: 'unknown', sequence };
    return { event, length: sequence.length };
  }

  if (introducer === '\x1b') {
    return { event: keyEvent('Escape'), length: 1 };
  }

  // ESC + char is how terminals send Alt+char
  return { event: parseSingleChar(introducer, true), length: 2 };
}

/**
 * Parse one raw chunk of terminal input into events, in arrival order
 */
export function parseInput(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let i = 0;
  while (i < data.length) {
    if (data[i] === '\x1b') {
      const { event, length } = parseEscape(data, i);
      events.push(event);
      i += length;
      continue;
    }
    // Keep surrogate pairs (emoji) together
    const ch = String.fromCodePoint(data.codePointAt(i) ?? 0);
    events.push(parseSingleChar(ch, false));
    i += ch.length;
  }
  return events;
}

/**
 * Length of an escape sequence cut off at the end of `data`, or 0.
 * A terminal may split one sequence across two reads.
 */
export function incompleteEscapeLength(data: string): number {
  const start = data.lastIndexOf('\x1b');
  if (start === -1) return 0;
  const rest = data.slice(start);
  if (rest === '\x1b' || rest === '\x1bO') return rest.length;
  if (rest.startsWith('\x1b[') && /^[0-9;?<>=:]*$/.test(rest.slice(2))) return rest.length;
  return 0;
}

export function isArrowKey(event: InputEvent): event is KeyInputEvent {
  return event.kind === 'key' && event.key.startsWith('Arrow');
}

/**
 * One-line description used by the debug trace
 */
export function describeEvent(event: InputEvent): string {
  switch (event.kind) {
    case 'key': {
      const mods = [event.ctrl && 'ctrl', event.alt && 'alt', event.shift && 'shift'].filter(Boolean);
      const name = event.key === ' ' ? 'Space' : event.key;
      return `Key(${[...mods, name].join('+')})`;
    }
    case 'mouse':
      return `Mouse(${event.action} ${event.button} @ ${event.col},${event.row})`;
    case 'resize':
      return `Resize(${event.cols}x${event.rows})`;
    case 'unknown':
      return `Unknown(${JSON.stringify(event.sequence)})`;
  }
}
