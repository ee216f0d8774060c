// slideSurface.ts - DOM drawing surface for rendered frames
// Owns the deck's DOM skeleton; draws whatever VisualFrame it is handed

import type { NavigationStatus, PresentationSurface } from '../core/presentation';
import { pathToHash, type SlidePath } from '../core/coreTypes';
import { classifyLinkTarget, type InlineSpan } from '../core/inlineMarkup';
import type { NavigationMessage } from '../core/navigationSchema';
import type { FrameBlock, FrameListItem, VisualFrame } from './frameRenderer';
import { DeckStyles, fragmentClass } from './deckStyles';

export type NavigateHandler = (message: NavigationMessage) => void;

export interface SlideSurfaceOptions {
    showNotes?: boolean;
    placeholderText?: string;
}

const STYLED_TAGS = {
    bold: 'strong',
    italic: 'em',
    verbatim: 'code',
    code: 'code',
    strike: 'del',
    underline: 'u',
} as const;

/**
 * Manages the presentation DOM: header, progress bar, error slot,
 * slide area, speaker notes and prev/next controls.
 */
export class SlideSurface implements PresentationSurface {
    private containerId: string;
    private slideId: string;
    private errorSlotId: string;
    private notesId: string;
    private showNotes: boolean;
    private placeholderText: string;
    private navigate: NavigateHandler | null = null;
    private anchors: Readonly<Record<string, SlidePath>> = {};

    constructor(containerId: string = 'deck-container', options: SlideSurfaceOptions = {}) {
        this.containerId = containerId;
        this.slideId = `${containerId}-slide`;
        this.errorSlotId = `${containerId}-error-slot`;
        this.notesId = `${containerId}-notes`;
        this.showNotes = options.showNotes ?? false;
        this.placeholderText = options.placeholderText ?? 'Image unavailable';
        this.setupDeckStructure();
    }

    /**
     * Create the deck DOM skeleton
     */
    private setupDeckStructure(): void {
        const container = document.getElementById(this.containerId);
        if (!container) {
            throw new Error(`Container ${this.containerId} not found`);
        }

        container.innerHTML = `
            <div class="${DeckStyles.containers.deck}">
                <header class="${DeckStyles.containers.header}">
                    <span id="${this.containerId}-title" class="${DeckStyles.typography.deckTitle}"></span>
                    <span id="${this.containerId}-counter" class="${DeckStyles.controls.counter}"></span>
                </header>
                <div class="${DeckStyles.progress.barContainer}">
                    <div id="${this.containerId}-progress" class="${DeckStyles.progress.barFill}" style="width: 0%"></div>
                </div>
                <div id="${this.errorSlotId}" class="hidden mb-6"></div>
                <section id="${this.slideId}" class="${DeckStyles.containers.slide}" aria-live="polite"></section>
                <aside id="${this.notesId}" class="hidden ${DeckStyles.containers.notes}"></aside>
                <nav class="${DeckStyles.controls.bar}">
                    <button id="${this.containerId}-prev" type="button" class="${DeckStyles.controls.button}">Previous</button>
                    <button id="${this.containerId}-next" type="button" class="${DeckStyles.controls.button}">Next</button>
                </nav>
            </div>
        `;

        document.getElementById(`${this.containerId}-prev`)?.addEventListener('click', () => {
            this.navigate?.({ method: 'retreat' });
        });
        document.getElementById(`${this.containerId}-next`)?.addEventListener('click', () => {
            this.navigate?.({ method: 'advance' });
        });

        console.log(`✅ Deck structure created for ${this.containerId}`);
    }

    /**
     * Route buttons and internal links to a navigation handler
     * @param anchors Document anchor table used to resolve inline links
     */
    connect(navigate: NavigateHandler, anchors: Readonly<Record<string, SlidePath>> = {}): void {
        this.navigate = navigate;
        this.anchors = anchors;
    }

    setDeckTitle(deckTitle: string | null): void {
        const title = document.getElementById(`${this.containerId}-title`);
        if (title) {
            title.textContent = deckTitle ?? '';
        }
        document.title = deckTitle ?? document.title;
    }

    draw(frame: VisualFrame, status: NavigationStatus): void {
        const slide = document.getElementById(this.slideId);
        if (!slide) {
            console.error(`Slide area ${this.slideId} not found`);
            return;
        }

        slide.replaceChildren();
        slide.dataset.path = status.cursor.path.join('.');
        slide.dataset.fragment = String(status.cursor.fragmentIndex);

        if (frame.title !== null) {
            const heading = document.createElement(frame.depth === 0 ? 'h1' : 'h2');
            heading.className = frame.depth === 0
                ? DeckStyles.typography.slideTitle
                : DeckStyles.typography.subSlideTitle;
            this.appendSpans(heading, frame.title);
            slide.appendChild(heading);
        }

        for (const block of frame.blocks) {
            slide.appendChild(this.buildBlock(block));
        }

        this.drawNotes(frame.notes);
        this.drawStatus(status);
    }

    /**
     * Get the error display area for the error handler
     * @returns Error slot DOM element or null
     */
    getErrorSlot(): HTMLElement | null {
        return document.getElementById(this.errorSlotId);
    }

    private drawNotes(notes: string | null): void {
        const aside = document.getElementById(this.notesId);
        if (!aside) return;

        if (this.showNotes && notes !== null) {
            aside.textContent = notes;
            aside.classList.remove('hidden');
        } else {
            aside.textContent = '';
            aside.classList.add('hidden');
        }
    }

    private drawStatus(status: NavigationStatus): void {
        const { index, total } = status.position;

        const counter = document.getElementById(`${this.containerId}-counter`);
        if (counter) {
            counter.textContent = `${index} / ${total}`;
        }

        const progress = document.getElementById(`${this.containerId}-progress`);
        if (progress) {
            progress.style.width = `${total === 0 ? 0 : (index / total) * 100}%`;
        }

        const prev = document.getElementById(`${this.containerId}-prev`);
        if (prev instanceof HTMLButtonElement) {
            prev.disabled = status.atStart;
        }
        const next = document.getElementById(`${this.containerId}-next`);
        if (next instanceof HTMLButtonElement) {
            next.disabled = status.atEnd;
        }
    }

    private buildBlock(block: FrameBlock): HTMLElement {
        const element = this.buildBlockElement(block);
        if (block.fragmentStyle !== null && block.kind !== 'list') {
            element.className = `${element.className} ${fragmentClass(block.fragmentStyle)}`.trim();
        }
        return element;
    }

    private buildBlockElement(block: FrameBlock): HTMLElement {
        switch (block.kind) {
            case 'paragraph': {
                const paragraph = document.createElement('p');
                paragraph.className = DeckStyles.typography.body;
                this.appendSpans(paragraph, block.spans);
                return paragraph;
            }

            case 'list':
                return this.buildList(block.ordered, block.items);

            case 'image':
                return this.buildImage(block);

            case 'quote': {
                const quote = document.createElement('blockquote');
                quote.className = DeckStyles.blocks.quote;
                quote.textContent = block.text;
                if (block.attribution !== null) {
                    const cite = document.createElement('cite');
                    cite.className = DeckStyles.blocks.attribution;
                    cite.textContent = `— ${block.attribution}`;
                    quote.appendChild(cite);
                }
                return quote;
            }

            case 'code': {
                const pre = document.createElement('pre');
                const code = document.createElement('code');
                code.className = block.highlighted && block.language
                    ? `${DeckStyles.blocks.code} language-${block.language}`
                    : DeckStyles.blocks.code;
                // highlight.js output is already escaped
                if (block.highlighted && block.html !== null) {
                    code.innerHTML = block.html;
                } else {
                    code.textContent = block.text;
                }
                pre.appendChild(code);
                return pre;
            }

            case 'link': {
                const paragraph = document.createElement('p');
                paragraph.className = DeckStyles.blocks.linkBlock;
                paragraph.appendChild(this.buildLink(block.href, block.label, block.target));
                return paragraph;
            }
        }
    }

    private buildList(ordered: boolean, items: FrameListItem[]): HTMLElement {
        const list = document.createElement(ordered ? 'ol' : 'ul');
        list.className = ordered ? DeckStyles.blocks.orderedList : DeckStyles.blocks.list;

        for (const item of items) {
            const li = document.createElement('li');
            if (item.fragmentStyle !== null) {
                li.className = fragmentClass(item.fragmentStyle);
            }
            this.appendSpans(li, item.spans);
            if (item.children.length > 0) {
                li.appendChild(this.buildList(ordered, item.children));
            }
            list.appendChild(li);
        }

        return list;
    }

    private buildImage(block: Extract<FrameBlock, { kind: 'image' }>): HTMLElement {
        const figure = document.createElement('figure');

        if (block.missing || block.src === null) {
            figure.appendChild(this.buildPlaceholder(block.path, block.placeholder));
        } else {
            const image = document.createElement('img');
            image.className = DeckStyles.blocks.image;
            image.src = block.src;
            image.alt = block.caption ?? block.path;
            // Asset vanished after probing (or was never probed)
            image.addEventListener('error', () => {
                console.warn(`🖼️ Failed to load image "${block.path}", showing placeholder`);
                image.replaceWith(this.buildPlaceholder(block.path, null));
            });
            figure.appendChild(image);
        }

        if (block.caption !== null) {
            const caption = document.createElement('figcaption');
            caption.className = DeckStyles.typography.caption;
            caption.textContent = block.caption;
            figure.appendChild(caption);
        }

        return figure;
    }

    private buildPlaceholder(path: string, text: string | null): HTMLElement {
        const placeholder = document.createElement('div');
        placeholder.className = `image-placeholder ${DeckStyles.blocks.imagePlaceholder}`;
        placeholder.dataset.path = path;
        placeholder.textContent = `${text ?? this.placeholderText}: ${path}`;
        return placeholder;
    }

    private appendSpans(parent: HTMLElement, spans: InlineSpan[]): void {
        for (const span of spans) {
            switch (span.kind) {
                case 'text':
                    parent.appendChild(document.createTextNode(span.text));
                    break;
                case 'styled': {
                    const element = document.createElement(STYLED_TAGS[span.style]);
                    if (span.style === 'code' || span.style === 'verbatim') {
                        element.className = DeckStyles.typography.inlineCode;
                    }
                    element.textContent = span.text;
                    parent.appendChild(element);
                    break;
                }
                case 'link': {
                    const target = classifyLinkTarget(span.href);
                    const path = target.kind === 'anchor' ? this.anchors[target.key] ?? null : null;
                    parent.appendChild(this.buildLink(span.href, span.label, path));
                    break;
                }
            }
        }
    }

    private buildLink(href: string, label: string, target: SlidePath | null): HTMLAnchorElement {
        const anchor = document.createElement('a');
        anchor.className = DeckStyles.typography.link;
        anchor.textContent = label;

        if (target !== null) {
            const path = [...target];
            anchor.href = pathToHash(path);
            anchor.dataset.target = path.join('.');
            anchor.addEventListener('click', (event) => {
                event.preventDefault();
                this.navigate?.({ method: 'jumpTo', args: [path] });
            });
        } else {
            anchor.href = href.startsWith('file:') ? href.slice('file:'.length) : href;
            anchor.target = '_blank';
            anchor.rel = 'noopener noreferrer';
        }

        return anchor;
    }
}
