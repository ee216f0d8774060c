// errorDisplay.ts - Error and notice UI for the deck surface
// Fatal load errors and recoverable navigation notices share the surface's error slot

import type { InvalidPathError } from '../core/navigationSchema';
import type { NavigationErrorReporter } from '../core/presentation';
import type { ParseError } from '../initialization/outlineParser';
import type { SlideSurface } from './slideSurface';

export type ErrorType = 'system' | 'network' | 'parse' | 'navigation';
export type ActionType = 'refresh' | 'dismiss';

interface ErrorInfo {
    type: ErrorType;
    title: string;
    message: string;
    context: string;
}

/**
 * How long a navigation notice stays up before clearing itself
 */
const NOTICE_TIMEOUT_MS = 4000;

/**
 * Manages error display UI that appears in the surface's error slot
 */
export class ErrorDisplay implements NavigationErrorReporter {
    protected surface: SlideSurface | null;
    protected activeErrors: Map<string, ErrorInfo> = new Map();
    protected noticeTimer: ReturnType<typeof setTimeout> | null = null;

    constructor(surface: SlideSurface | null = null) {
        this.surface = surface;
    }

    /**
     * Display a system error (config problems, unexpected failures)
     */
    showSystemError(errorId: string = 'system', context: string = '', details: string = ''): void {
        this._showError({
            errorId,
            errorType: 'system',
            title: 'System Error',
            message: "We're having trouble starting the presentation.",
            context,
            details,
            actions: ['refresh'],
        });
    }

    /**
     * Display a deck download failure
     */
    showNetworkError(errorId: string = 'network', context: string = ''): void {
        this._showError({
            errorId,
            errorType: 'network',
            title: 'Connection Issue',
            message: 'Unable to download the slide deck.',
            context,
            actions: ['refresh'],
        });
    }

    /**
     * Display a fatal deck parse failure with the offending line
     */
    showParseError(error: ParseError): void {
        this._showError({
            errorId: 'parse',
            errorType: 'parse',
            title: 'Slide Deck Error',
            message: `Line ${error.line}: ${error.reason}`,
            context: error.region,
            actions: ['refresh'],
        });
    }

    /**
     * Display a rejected jump. Clears itself after a few seconds.
     */
    showNavigationNotice(error: InvalidPathError): void {
        this._showError({
            errorId: 'navigation',
            errorType: 'navigation',
            title: 'Slide Not Found',
            message: error.message,
            actions: ['dismiss'],
        });
        if (this.noticeTimer !== null) {
            clearTimeout(this.noticeTimer);
        }
        this.noticeTimer = setTimeout(() => {
            this.noticeTimer = null;
            this.clearError('navigation');
        }, NOTICE_TIMEOUT_MS);
    }

    /**
     * Remove a specific error
     */
    clearError(errorId: string): void {
        if (this.activeErrors.has(errorId)) {
            const errorElement = document.getElementById(`error-${errorId}`);
            if (errorElement) {
                errorElement.remove();
            }
            this.activeErrors.delete(errorId);
            console.log(`🧹 Cleared error: ${errorId}`);
        }

        // Hide error slot if no errors remain
        if (this.activeErrors.size === 0) {
            this._hideErrorSlot();
        }
    }

    /**
     * Clear all active errors
     */
    clearAllErrors(): void {
        const errorIds = Array.from(this.activeErrors.keys());
        for (const errorId of errorIds) {
            this.clearError(errorId);
        }
        console.log('🧹 All errors cleared');
    }

    hasError(errorId: string): boolean {
        return this.activeErrors.has(errorId);
    }

    /**
     * Internal method to display an error in the error slot
     */
    protected _showError(params: {
        errorId: string;
        errorType: ErrorType;
        title: string;
        message: string;
        context?: string;
        details?: string;
        actions?: ActionType[];
    }): void {
        const { errorId, errorType, title, message, context = '', details = '', actions = ['dismiss'] } = params;

        // Replace an earlier error with the same id
        document.getElementById(`error-${errorId}`)?.remove();

        this.activeErrors.set(errorId, {
            type: errorType,
            title,
            message,
            context,
        });

        const element = this._buildErrorElement(errorId, title, message, context, details, actions);
        const errorSlot = this._getErrorSlot();

        if (!errorSlot) {
            // Fallback: floating error if the surface never came up
            this._getFloatingContainer().appendChild(element);
            console.log(`💫 Created floating error: ${errorId}`);
            return;
        }

        errorSlot.classList.remove('hidden');
        errorSlot.appendChild(element);

        console.log(`❌ Displayed error: ${errorId} (${errorType})`);
    }

    /**
     * Build the DOM for an error. All text goes through textContent.
     */
    protected _buildErrorElement(
        errorId: string,
        title: string,
        message: string,
        context: string,
        details: string,
        actions: ActionType[]
    ): HTMLElement {
        const item = document.createElement('div');
        item.id = `error-${errorId}`;
        item.className = 'error-item bg-red-50 border border-red-200 rounded-lg p-4 mb-4';

        const heading = document.createElement('h3');
        heading.className = 'text-sm font-medium text-red-800';
        heading.textContent = title;
        item.appendChild(heading);

        const body = document.createElement('p');
        body.className = 'error-message text-sm text-red-700 mt-1';
        body.textContent = message;
        item.appendChild(body);

        if (context) {
            const contextEl = document.createElement('pre');
            contextEl.className = 'error-context text-sm text-red-600 mt-1 whitespace-pre-wrap';
            contextEl.textContent = context;
            item.appendChild(contextEl);
        }

        if (details) {
            const detailsEl = document.createElement('details');
            detailsEl.className = 'mt-2 text-xs text-red-500';
            const summary = document.createElement('summary');
            summary.textContent = 'Technical Details';
            const pre = document.createElement('pre');
            pre.textContent = details;
            detailsEl.append(summary, pre);
            item.appendChild(detailsEl);
        }

        const buttons = document.createElement('div');
        buttons.className = 'mt-3 flex space-x-2';
        for (const action of actions) {
            buttons.appendChild(this._buildActionButton(errorId, action));
        }
        item.appendChild(buttons);

        return item;
    }

    protected _buildActionButton(errorId: string, action: ActionType): HTMLButtonElement {
        const button = document.createElement('button');
        button.type = 'button';
        button.dataset.action = action;

        switch (action) {
            case 'refresh':
                button.className = 'text-xs bg-blue-600 text-white px-2 py-1 rounded hover:bg-blue-700';
                button.textContent = 'Reload';
                button.addEventListener('click', () => window.location.reload());
                break;
            case 'dismiss':
                button.className = 'text-xs bg-red-600 text-white px-2 py-1 rounded hover:bg-red-700';
                button.textContent = 'Dismiss';
                button.addEventListener('click', () => this.clearError(errorId));
                break;
        }

        return button;
    }

    protected _getErrorSlot(): HTMLElement | null {
        return this.surface ? this.surface.getErrorSlot() : null;
    }

    /**
     * Hide the error slot when no errors are active
     */
    protected _hideErrorSlot(): void {
        const errorSlot = this._getErrorSlot();
        if (errorSlot) {
            errorSlot.classList.add('hidden');
            errorSlot.replaceChildren();
        }
    }

    protected _getFloatingContainer(): HTMLElement {
        let floatingContainer = document.getElementById('floating-errors');
        if (!floatingContainer) {
            floatingContainer = document.createElement('div');
            floatingContainer.id = 'floating-errors';
            floatingContainer.className = 'fixed top-4 right-4 z-50 max-w-md';
            document.body.appendChild(floatingContainer);
        }
        return floatingContainer;
    }
}
