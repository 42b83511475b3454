// src/views/ViewerPage.tsx

import { Layout } from './Layout';
import type { ViewerPageModel } from './types';
import { CHAT_GREETING } from '../models/chat.constants';

export function ViewerPage({ fileKey, displayName, pdfUrl }: ViewerPageModel) {
    return (
        <Layout
            title={`${displayName} - PDF Viewer`}
            bodyClassName="viewer-page"
            head={
                <>
                    <link rel="stylesheet" href="/vendor/pdfjs/web/pdf_viewer.css" />
                    <script type="module" src="/static/js/viewer.js" />
                </>
            }
        >
            <div id="viewer" className="viewer" data-file-key={fileKey} data-pdf-url={pdfUrl} data-display-name={displayName}>
                <header className="toolbar">
                    <a className="back-link" href="/">
                        ← Back
                    </a>
                    <h1 className="document-title">{displayName}</h1>
                    <div className="page-controls">
                        <button id="prevPage" type="button" title="Previous page">
                            ‹
                        </button>
                        <span className="page-info">
                            Page <span id="currentPage">1</span> of <span id="totalPages">?</span>
                        </span>
                        <button id="nextPage" type="button" title="Next page">
                            ›
                        </button>
                    </div>
                    <div className="zoom-controls">
                        <button id="zoomOut" type="button" title="Zoom out">
                            −
                        </button>
                        <span id="zoomLevel">120%</span>
                        <button id="zoomIn" type="button" title="Zoom in">
                            +
                        </button>
                        <button id="resetZoom" type="button" title="Reset zoom">
                            Reset
                        </button>
                    </div>
                </header>
                <div className="progress">
                    <div id="progressBar" className="progress-bar" />
                </div>

                <div className="workspace">
                    <div id="scrollContainer" className="page-scroll">
                        <div id="loading" className="loading">
                            Loading PDF…
                        </div>
                        <div id="pageContainer" className="page-container">
                            <canvas id="pdfCanvas" />
                            <div id="textLayer" className="textLayer" />
                        </div>
                        <div id="scrollIndicator" className="scroll-indicator" aria-hidden="true">
                            <div>Scroll to navigate</div>
                            <div>↑ Previous page</div>
                            <div>↓ Next page</div>
                        </div>
                    </div>

                    <aside id="chatPanel" className="chat-panel">
                        <div className="chat-header">
                            <h2>Assistant</h2>
                            <button id="chatClear" type="button">
                                Clear
                            </button>
                            <button id="chatToggle" type="button">
                                Hide
                            </button>
                        </div>
                        <div id="chatMessages" className="chat-messages">
                            <div className="message system">{CHAT_GREETING}</div>
                        </div>
                        <div className="chat-input">
                            <textarea id="chatInput" rows={2} placeholder="Ask about this PDF…" />
                            <button id="chatSend" type="button">
                                Send
                            </button>
                        </div>
                    </aside>
                </div>
            </div>
        </Layout>
    );
}
