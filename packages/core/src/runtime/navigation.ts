/**
 * packages/core/src/runtime/navigation.ts — Screen stack and dialog stack.
 *
 * The current screen sits outside the stack; the stack holds the screens
 * below it together with the node each had focused when it was covered.
 * Dialogs form a separate stack owned by the current screen: the top dialog
 * is the exclusive focus and input target, and every navigation between
 * screens closes them.
 */

import type { UiContext } from "../app/context.js";
import { LoomError, describeThrown } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { UiNode } from "../tree/node.js";
import type { FocusManager } from "./focus.js";
import type { Screen } from "./screen.js";

type ScreenEntry = Readonly<{
  screen: Screen;
  focus: UiNode | null;
}>;

type DialogEntry = Readonly<{
  root: UiNode;
  /** Focus of whatever the dialog covered. */
  restoreFocus: UiNode | null;
}>;

export type NavigatorOptions = Readonly<{
  focus: FocusManager;
  context: () => UiContext;
  requestRedraw: () => void;
  logger: Logger;
}>;

export class Navigator {
  private current: Screen | null = null;
  private readonly screens: ScreenEntry[] = [];
  private readonly dialogs: DialogEntry[] = [];
  private readonly focus: FocusManager;
  private readonly context: () => UiContext;
  private readonly requestRedraw: () => void;
  private readonly logger: Logger;

  constructor(opts: NavigatorOptions) {
    this.focus = opts.focus;
    this.context = opts.context;
    this.requestRedraw = opts.requestRedraw;
    this.logger = opts.logger.child("nav");
  }

  get currentScreen(): Screen | null {
    return this.current;
  }

  /** Screens below the current one. */
  get depth(): number {
    return this.screens.length;
  }

  get activeDialog(): UiNode | null {
    return this.dialogs[this.dialogs.length - 1]?.root ?? null;
  }

  get dialogCount(): number {
    return this.dialogs.length;
  }

  /** Root that owns focus and input: the top dialog, else the current screen. */
  get scopeRoot(): UiNode | null {
    return this.activeDialog ?? this.current;
  }

  pushScreen(screen: Screen): void {
    this.enterScreen(screen, true);
  }

  /** Like pushScreen, but the current screen is exited without being kept. */
  replaceScreen(screen: Screen): void {
    this.enterScreen(screen, false);
  }

  popScreen(): boolean {
    const below = this.screens[this.screens.length - 1];
    if (below === undefined) return false;

    const ctx = this.context();
    this.focus.setFocus(null);
    this.discardDialogs(ctx);
    this.current?.onExit(ctx);
    this.screens.pop();
    this.current = below.screen;
    below.screen.onResume(ctx);
    this.restoreFocus(below.focus);
    this.logger.debug(`pop -> "${below.screen.id}"`);
    this.requestRedraw();
    return true;
  }

  showDialog(root: UiNode): void {
    if (this.dialogs.some((d) => d.root === root)) {
      throw new LoomError("LOOM_INVALID_STATE", `dialog "${root.id}" is already open`);
    }
    const remembered = this.focus.focusedNode;
    this.focus.setFocus(null);
    this.dialogs.push(Object.freeze({ root, restoreFocus: remembered }));
    this.focus.focusFirst();
    this.logger.debug(`dialog open "${root.id}" (${String(this.dialogs.length)} open)`);
    this.requestRedraw();
  }

  closeDialog(): boolean {
    const entry = this.dialogs.pop();
    if (entry === undefined) return false;

    const ctx = this.context();
    this.focus.setFocus(null);
    entry.root.onClose(ctx);
    const target = entry.restoreFocus;
    if (target !== null && this.focus.isValidTarget(target)) {
      this.focus.setFocus(target);
    } else if (this.dialogs.length > 0) {
      this.focus.focusFirst();
    }
    this.logger.debug(`dialog close "${entry.root.id}"`);
    this.requestRedraw();
    return true;
  }

  private screenFocus(): UiNode | null {
    const bottom = this.dialogs[0];
    return bottom === undefined ? this.focus.focusedNode : bottom.restoreFocus;
  }

  private restoreFocus(node: UiNode | null): void {
    if (node !== null && this.focus.isValidTarget(node)) this.focus.setFocus(node);
  }

  private discardDialogs(ctx: UiContext): void {
    for (let entry = this.dialogs.pop(); entry !== undefined; entry = this.dialogs.pop()) {
      entry.root.onClose(ctx);
    }
  }

  private enterScreen(screen: Screen, keepPrevious: boolean): void {
    if (screen === this.current || this.screens.some((e) => e.screen === screen)) {
      throw new LoomError("LOOM_INVALID_STATE", `screen "${screen.id}" is already on the stack`);
    }
    const ctx = this.context();
    const previous = this.current;
    const previousFocus = this.screenFocus();

    this.focus.setFocus(null);
    this.discardDialogs(ctx);
    if (previous !== null) {
      previous.onExit(ctx);
      if (keepPrevious) this.screens.push(Object.freeze({ screen: previous, focus: previousFocus }));
    }
    this.current = screen;

    try {
      screen.init(ctx);
    } catch (e: unknown) {
      this.focus.setFocus(null);
      this.current = null;
      if (previous !== null) {
        if (keepPrevious) this.screens.pop();
        this.current = previous;
        previous.onResume(ctx);
        this.restoreFocus(previousFocus);
      }
      this.requestRedraw();
      throw new LoomError(
        "LOOM_INITIALIZATION",
        `init of screen "${screen.id}" failed: ${describeThrown(e)}`,
        { cause: e },
      );
    }

    this.logger.debug(`${keepPrevious ? "push" : "replace"} -> "${screen.id}"`);
    this.requestRedraw();
  }
}
