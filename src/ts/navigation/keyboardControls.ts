// keyboardControls.ts - Maps key presses to navigation messages

import type { Keymap } from '../core/settingsSchema';
import type { NavigationMessage } from '../core/navigationSchema';

export type NavigationDispatch = (message: NavigationMessage) => void;

/**
 * Translate a keydown event into a navigation message, or null when the
 * key is unbound or belongs to someone else (modifiers, form fields).
 */
export function messageForKey(event: KeyboardEvent, keymap: Keymap): NavigationMessage | null {
    if (event.altKey || event.ctrlKey || event.metaKey) {
        return null;
    }
    if (isEditableTarget(event.target)) {
        return null;
    }

    if (keymap.advance.includes(event.key)) {
        return { method: 'advance' };
    }
    if (keymap.retreat.includes(event.key)) {
        return { method: 'retreat' };
    }
    if (keymap.first.includes(event.key)) {
        return { method: 'jumpTo', args: [[0]] };
    }
    return null;
}

/**
 * Listen for keydown on the target and dispatch bound keys.
 * @returns Function that removes the listener
 */
export function attachKeyboardControls(
    target: Document | HTMLElement,
    keymap: Keymap,
    dispatch: NavigationDispatch
): () => void {
    const onKeyDown = (event: Event): void => {
        if (!(event instanceof KeyboardEvent)) return;

        const message = messageForKey(event, keymap);
        if (message === null) return;

        event.preventDefault();
        dispatch(message);
    };

    target.addEventListener('keydown', onKeyDown);
    console.log('⌨️ Keyboard controls attached');

    return () => {
        target.removeEventListener('keydown', onKeyDown);
        console.log('⌨️ Keyboard controls detached');
    };
}

function isEditableTarget(target: EventTarget | null): boolean {
    if (!(target instanceof HTMLElement)) return false;
    if (target.isContentEditable) return true;
    return target instanceof HTMLInputElement
        || target instanceof HTMLTextAreaElement
        || target instanceof HTMLSelectElement;
}
