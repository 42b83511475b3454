// src/views/UploadPage.tsx

import { Layout } from './Layout';
import { formatBytes, formatDate } from '../utils/format';
import type { UploadPageModel } from './types';

export function UploadPage({ recentFiles, error, maxUploadBytes }: UploadPageModel) {
    return (
        <Layout title="PDF Viewer" bodyClassName="upload-page" head={<script type="module" src="/static/js/upload.js" />}>
            <main className="upload-container">
                <h1>PDF Viewer</h1>
                <p className="subtitle">Upload a PDF to read it and ask questions about it.</p>

                {error ? (
                    <div className="flash-messages">
                        <div className="flash-message flash-error" role="alert">
                            {error}
                        </div>
                    </div>
                ) : null}

                <form className="upload-form" method="post" action="/" encType="multipart/form-data">
                    <label id="uploadArea" className="upload-area" htmlFor="file">
                        <span className="upload-text">Choose a PDF file or drop it here</span>
                        <span className="upload-hint">Maximum size {formatBytes(maxUploadBytes)}</span>
                    </label>
                    <input id="file" name="file" type="file" accept=".pdf,application/pdf" required />
                    <div id="fileInfo" className="file-info" hidden>
                        <span id="fileName" className="file-name" />
                        <span id="fileSize" className="file-size" />
                    </div>
                    <button className="upload-btn" type="submit">
                        Upload &amp; View
                    </button>
                </form>

                <section className="recent-files">
                    <h2>Recent files</h2>
                    {recentFiles.length === 0 ? (
                        <p className="empty">No files uploaded yet.</p>
                    ) : (
                        <ul>
                            {recentFiles.map((file) => (
                                <li key={file.key} className="recent-file">
                                    <a href={`/view/${encodeURIComponent(file.key)}`}>{file.displayName}</a>
                                    <span className="file-meta">
                                        {formatDate(file.modifiedAt)} · {formatBytes(file.sizeBytes)}
                                    </span>
                                </li>
                            ))}
                        </ul>
                    )}
                </section>
            </main>
        </Layout>
    );
}
