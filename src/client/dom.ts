// src/client/dom.ts

/** Looks up an element the server-rendered page is expected to contain. */
export function byId<T extends HTMLElement>(id: string, type: { new (): T }): T {
    const element = document.getElementById(id);
    if (!(element instanceof type)) {
        throw new Error(`Page markup is missing #${id}`);
    }
    return element;
}

export function onReady(start: () => void): void {
    if (document.readyState === 'loading') {
        document.addEventListener('DOMContentLoaded', start);
    } else {
        start();
    }
}
