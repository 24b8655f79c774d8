/**
 * List state for thread output
 *
 * Each open list has a scope recording the macro for its next item and two
 * flags: `pending` when an =item has been seen but its body has not, and
 * `open` when an item's `[` has been written and its `]` has not. An item's
 * opening macro is only written once its body (or the next item, heading or
 * list end) arrives.
 */

import type { ListKind } from './podElementTypes';
import type { OutputSink } from './threadOutput';

export const BLOCK_TAG = '\\block';

export interface ListScope {
    kind: ListKind;
    /** Macro that opens the next item, such as `\bullet` or `\desc[label]` */
    tag: string;
    pending: boolean;
    open: boolean;
}

export class ListStack {
    private readonly scopes: ListScope[] = [];

    constructor(private readonly sink: OutputSink) {}

    get inList(): boolean {
        return this.scopes.length > 0;
    }

    private current(): ListScope | undefined {
        return this.scopes[this.scopes.length - 1];
    }

    /**
     * Start a list. A pending item in the enclosing list is opened first,
     * so the nested list sits inside its brackets.
     */
    enter(kind: ListKind): void {
        if (this.current()?.pending) {
            this.item('');
        }
        this.scopes.push({ kind, tag: kind === 'block' ? BLOCK_TAG : '', pending: false, open: false });
    }

    /**
     * Record an =item; its macro is written when its body arrives
     */
    startItem(tag: string): void {
        const scope = this.current();
        if (!scope) {
            return;
        }
        if (scope.pending) {
            this.item('');
        }
        scope.tag = tag;
        scope.pending = true;
    }

    /**
     * Write block content inside the current list.
     *
     * The first body after an =item closes the previous item and opens the
     * new one with its macro. Later bodies continue the open item. In a
     * block list, the first body opens a `\block`.
     */
    item(body: string): void {
        const scope = this.current();
        if (!scope) {
            this.sink.output(body);
            return;
        }

        if (scope.pending) {
            this.closeOpen(scope);
            this.sink.output(`${scope.tag}\n[${body}`);
            scope.open = true;
            scope.pending = false;
        } else if (scope.kind === 'block' && !scope.open) {
            this.sink.output(`${BLOCK_TAG}\n[${body}`);
            scope.open = true;
        } else {
            this.sink.output(body);
        }
    }

    /**
     * Write any pending item and close the open one in the current list
     */
    closeItem(): void {
        const scope = this.current();
        if (!scope) {
            return;
        }
        if (scope.pending) {
            this.item('');
        }
        this.closeOpen(scope);
    }

    /**
     * End the current list
     * @returns false when there is no list to end
     */
    exit(): boolean {
        if (!this.current()) {
            return false;
        }
        this.closeItem();
        this.scopes.pop();
        return true;
    }

    /**
     * End every open list
     */
    exitAll(): void {
        while (this.scopes.length > 0) {
            this.exit();
        }
    }

    private closeOpen(scope: ListScope): void {
        if (scope.open) {
            this.sink.output(']\n');
            scope.open = false;
        }
    }
}
