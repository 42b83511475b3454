// src/views/render.ts

import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { UploadPage } from './UploadPage';
import { ViewerPage } from './ViewerPage';
import type { UploadPageModel, ViewerPageModel } from './types';

function toDocument(markup: string): string {
    return `<!DOCTYPE html>${markup}`;
}

export function renderUploadPage(model: UploadPageModel): string {
    return toDocument(renderToStaticMarkup(createElement(UploadPage, model)));
}

export function renderViewerPage(model: ViewerPageModel): string {
    return toDocument(renderToStaticMarkup(createElement(ViewerPage, model)));
}
