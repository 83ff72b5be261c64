/**
 * packages/core/src/app/notifications.ts — Transient notifications (toasts).
 *
 * Expiry runs from the frame loop's housekeeping step: a notification is gone
 * once `now >= expiresAtMs`.
 */

import { invalidProps } from "../errors.js";

export type NotificationLevel = "info" | "success" | "warning" | "error";

export type Notification = Readonly<{
  id: number;
  message: string;
  level: NotificationLevel;
  createdAtMs: number;
  expiresAtMs: number;
}>;

export type NotifyOptions = Readonly<{
  level?: NotificationLevel;
  /** Overrides the center's default lifetime. */
  ttlMs?: number;
}>;

export type NotificationCenterOptions = Readonly<{
  ttlMs: number;
  /** Oldest notifications beyond this count are dropped. Default 5. */
  maxActive?: number;
}>;

export class NotificationCenter {
  private readonly ttlMs: number;
  private readonly maxActive: number;
  private items: Notification[] = [];
  private nextId = 1;

  constructor(opts: NotificationCenterOptions) {
    this.ttlMs = opts.ttlMs;
    this.maxActive = opts.maxActive ?? 5;
  }

  /** Oldest first. */
  get active(): readonly Notification[] {
    return this.items;
  }

  notify(message: string, nowMs: number, opts: NotifyOptions = {}): Notification {
    const ttlMs = opts.ttlMs ?? this.ttlMs;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) invalidProps("notification ttlMs must be positive");
    const n: Notification = Object.freeze({
      id: this.nextId++,
      message,
      level: opts.level ?? "info",
      createdAtMs: nowMs,
      expiresAtMs: nowMs + ttlMs,
    });
    this.items = [...this.items, n];
    if (this.items.length > this.maxActive) {
      this.items = this.items.slice(this.items.length - this.maxActive);
    }
    return n;
  }

  dismiss(id: number): boolean {
    const before = this.items.length;
    this.items = this.items.filter((n) => n.id !== id);
    return this.items.length !== before;
  }

  /** Drop expired notifications; returns how many were removed. */
  expire(nowMs: number): number {
    const before = this.items.length;
    this.items = this.items.filter((n) => nowMs < n.expiresAtMs);
    return before - this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
