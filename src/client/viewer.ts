// src/client/viewer.ts
// Browser entry for the viewer page; bundled to public/js/viewer.js.

import { configurePdfWorker, PdfJsRenderer } from './pdfRenderer';
import { ViewerSession, type ViewerSnapshot } from './viewerSession';
import { WheelNavigator } from './wheelNavigator';
import { PanController, type Point } from './panController';
import { ChatSession, fetchTransport, type ChatEntryKind } from './chatSession';
import { CHAT_GREETING } from '../models/chat.constants';
import { byId, onReady } from './dom';

const DRAG_RELEASE_LOCK_MS = 500;

function reportError(error: unknown): void {
    console.error('Viewer error:', error);
}

function start(): void {
    const root = byId('viewer', HTMLDivElement);
    const fileKey = root.dataset.fileKey ?? '';
    const pdfUrl = root.dataset.pdfUrl ?? '';

    const canvas = byId('pdfCanvas', HTMLCanvasElement);
    const textLayer = byId('textLayer', HTMLDivElement);
    const pageContainer = byId('pageContainer', HTMLDivElement);
    const scrollContainer = byId('scrollContainer', HTMLDivElement);
    const loading = byId('loading', HTMLDivElement);
    const currentPageLabel = byId('currentPage', HTMLSpanElement);
    const totalPagesLabel = byId('totalPages', HTMLSpanElement);
    const zoomLabel = byId('zoomLevel', HTMLSpanElement);
    const progressBar = byId('progressBar', HTMLDivElement);
    const scrollIndicator = byId('scrollIndicator', HTMLDivElement);

    configurePdfWorker('/vendor/pdfjs/build/pdf.worker.min.mjs');
    const session = new ViewerSession(new PdfJsRenderer(pdfUrl, { canvas, textLayer }));
    const pan = new PanController();

    const updateCursor = (snapshot: ViewerSnapshot) => {
        pageContainer.style.cursor = pan.isDragging ? 'grabbing' : pan.canPan(snapshot.zoomScale) ? 'grab' : 'default';
    };

    session.subscribe((snapshot) => {
        currentPageLabel.textContent = String(snapshot.currentPage);
        totalPagesLabel.textContent = snapshot.status === 'loading' ? '?' : String(snapshot.totalPages);
        zoomLabel.textContent = `${Math.round(snapshot.zoomScale * 100)}%`;
        progressBar.style.width = `${snapshot.progress * 100}%`;
        loading.hidden = snapshot.status !== 'loading' && snapshot.status !== 'error';
        if (snapshot.status === 'error') {
            loading.textContent = `Error loading PDF: ${snapshot.error ?? 'unknown error'}`;
        }
        updateCursor(snapshot);
    });

    // --- Navigation controls ---
    const run = (action: () => Promise<unknown>) => () => {
        action().catch(reportError);
    };
    byId('prevPage', HTMLButtonElement).addEventListener('click', run(() => session.previous()));
    byId('nextPage', HTMLButtonElement).addEventListener('click', run(() => session.next()));
    byId('zoomIn', HTMLButtonElement).addEventListener('click', run(() => session.zoomIn()));
    byId('zoomOut', HTMLButtonElement).addEventListener('click', run(() => session.zoomOut()));
    byId('resetZoom', HTMLButtonElement).addEventListener('click', run(() => session.resetZoom()));

    const wheel = new WheelNavigator(
        (direction) => {
            run(() => (direction === 'next' ? session.next() : session.previous()))();
        },
        {},
        (visible) => scrollIndicator.classList.toggle('show', visible),
    );
    scrollContainer.addEventListener(
        'wheel',
        (event) => {
            if (event.ctrlKey) return;
            event.preventDefault();
            wheel.handleWheel(event.deltaY);
        },
        { passive: false },
    );

    document.addEventListener('keydown', (event) => {
        if (event.target instanceof HTMLTextAreaElement || event.target instanceof HTMLInputElement) return;
        switch (event.key) {
            case 'ArrowLeft':
            case 'ArrowUp':
            case 'PageUp':
                event.preventDefault();
                run(() => session.previous())();
                break;
            case 'ArrowRight':
            case 'ArrowDown':
            case 'PageDown':
                event.preventDefault();
                run(() => session.next())();
                break;
            case '+':
            case '=':
                if (event.ctrlKey) {
                    event.preventDefault();
                    run(() => session.zoomIn())();
                }
                break;
            case '-':
                if (event.ctrlKey) {
                    event.preventDefault();
                    run(() => session.zoomOut())();
                }
                break;
            case '0':
                if (event.ctrlKey) {
                    event.preventDefault();
                    run(() => session.resetZoom())();
                }
                break;
        }
    });

    // --- Drag to pan ---
    const scrollPosition = (): Point => ({ x: scrollContainer.scrollLeft, y: scrollContainer.scrollTop });
    const applyScroll = (offset: Point | null) => {
        if (!offset) return;
        scrollContainer.scrollLeft = offset.x;
        scrollContainer.scrollTop = offset.y;
    };
    const onTextLayer = (target: EventTarget | null) => target instanceof Element && target.closest('.textLayer') !== null;
    const finishDrag = () => {
        if (pan.end()) {
            wheel.unlockAfter(DRAG_RELEASE_LOCK_MS);
            updateCursor(session.snapshot());
        }
    };

    pageContainer.addEventListener('mousedown', (event) => {
        const started = pan.begin(
            { x: event.clientX, y: event.clientY },
            scrollPosition(),
            session.snapshot().zoomScale,
            onTextLayer(event.target),
        );
        if (started) {
            wheel.lock();
            updateCursor(session.snapshot());
            event.preventDefault();
        }
    });
    pageContainer.addEventListener('mousemove', (event) => {
        if (!pan.isDragging) return;
        applyScroll(pan.move({ x: event.clientX, y: event.clientY }));
        event.preventDefault();
    });
    pageContainer.addEventListener('mouseup', finishDrag);
    pageContainer.addEventListener('mouseleave', finishDrag);

    canvas.addEventListener(
        'touchstart',
        (event) => {
            const touch = event.touches[0];
            if (event.touches.length !== 1 || !touch) return;
            if (pan.begin({ x: touch.clientX, y: touch.clientY }, scrollPosition(), session.snapshot().zoomScale, false)) {
                event.preventDefault();
            }
        },
        { passive: false },
    );
    canvas.addEventListener(
        'touchmove',
        (event) => {
            const touch = event.touches[0];
            if (!pan.isDragging || !touch) return;
            applyScroll(pan.move({ x: touch.clientX, y: touch.clientY }));
            event.preventDefault();
        },
        { passive: false },
    );
    canvas.addEventListener('touchend', () => {
        pan.end();
    });

    // --- Chat ---
    const chatPanel = byId('chatPanel', HTMLElement);
    const chatMessages = byId('chatMessages', HTMLDivElement);
    const chatInput = byId('chatInput', HTMLTextAreaElement);
    const chatSend = byId('chatSend', HTMLButtonElement);
    const chatToggle = byId('chatToggle', HTMLButtonElement);

    const addMessage = (kind: ChatEntryKind, content: string) => {
        const bubble = document.createElement('div');
        bubble.className = `message ${kind}`;
        bubble.textContent = content;
        chatMessages.appendChild(bubble);
        chatMessages.scrollTop = chatMessages.scrollHeight;
    };

    const chat = new ChatSession(fetchTransport('/chat'), {
        onEntry: addMessage,
        onPendingChange: (pending) => {
            chatSend.disabled = pending;
            chatInput.disabled = pending;
            chatSend.textContent = pending ? 'Sending...' : 'Send';
        },
    });

    const sendMessage = () => {
        const snapshot = session.snapshot();
        const message = chatInput.value;
        if (!message.trim()) return;
        chatInput.value = '';
        chat.send(message, {
            filename: fileKey,
            currentPage: snapshot.currentPage,
            totalPages: snapshot.status === 'ready' ? snapshot.totalPages : 0,
            selectedText: window.getSelection()?.toString() ?? '',
        }).catch(reportError);
    };

    chatSend.addEventListener('click', sendMessage);
    chatInput.addEventListener('keydown', (event) => {
        if (event.key === 'Enter' && !event.shiftKey) {
            event.preventDefault();
            sendMessage();
        }
    });
    byId('chatClear', HTMLButtonElement).addEventListener('click', () => {
        chat.reset();
        chatMessages.replaceChildren();
        addMessage('system', CHAT_GREETING);
    });
    chatToggle.addEventListener('click', () => {
        const collapsed = chatPanel.classList.toggle('collapsed');
        chatToggle.textContent = collapsed ? 'Show' : 'Hide';
    });

    window.addEventListener('beforeunload', () => {
        wheel.dispose();
        session.close().catch(reportError);
    });

    session
        .open()
        .then(() => {
            if (session.snapshot().status === 'ready') wheel.showHint();
        })
        .catch(reportError);
}

onReady(start);
