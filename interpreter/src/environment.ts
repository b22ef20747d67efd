/**
 * Binding frames for the Schemelet interpreter.
 *
 * A frame is an ordered list of (name, cell) bindings searched front to
 * back. Cells are shared: `bindVars` builds a new frame that reuses the
 * cells of the frame it extends, so `set!` through either frame is seen
 * by every closure holding one of them. `define` of a new name only adds
 * to the frame it is called on.
 */

import { LispValue } from './values';
import { LispError, unboundVariable } from './errors';
import { Result, ok, err } from './result';

interface Cell {
  value: LispValue;
}

interface Binding {
  name: string;
  cell: Cell;
}

export class Environment {
  private bindings: Binding[];

  constructor(bindings: Binding[] = []) {
    this.bindings = bindings;
  }

  private lookup(name: string): Cell | undefined {
    return this.bindings.find(b => b.name === name)?.cell;
  }

  isBound(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  getVar(name: string): Result<LispValue, LispError> {
    const cell = this.lookup(name);
    if (cell === undefined) {
      return err(unboundVariable('Getting an unbound variable', name));
    }
    return ok(cell.value);
  }

  /**
   * Overwrite an existing binding in place. Returns the assigned value.
   */
  setVar(name: string, value: LispValue): Result<LispValue, LispError> {
    const cell = this.lookup(name);
    if (cell === undefined) {
      return err(unboundVariable('Setting an unbound variable', name));
    }
    cell.value = value;
    return ok(value);
  }

  /**
   * Assign if already bound, otherwise add a fresh binding to this frame.
   */
  defineVar(name: string, value: LispValue): LispValue {
    const cell = this.lookup(name);
    if (cell !== undefined) {
      cell.value = value;
    } else {
      this.bindings.unshift({ name, cell: { value } });
    }
    return value;
  }

  /**
   * Create a new frame with `vars` in front of this frame's bindings.
   * The first occurrence of a name wins on lookup.
   */
  bindVars(vars: ReadonlyArray<readonly [string, LispValue]>): Environment {
    const fresh = vars.map(([name, value]): Binding => ({ name, cell: { value } }));
    return new Environment([...fresh, ...this.bindings]);
  }

  /**
   * Visible bindings in lookup order, shadowed names omitted.
   */
  entries(): Array<[string, LispValue]> {
    const seen = new Set<string>();
    const out: Array<[string, LispValue]> = [];
    for (const { name, cell } of this.bindings) {
      if (seen.has(name)) continue;
      seen.add(name);
      out.push([name, cell.value]);
    }
    return out;
  }
}
