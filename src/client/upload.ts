// src/client/upload.ts
// Browser entry for the upload page; bundled to public/js/upload.js.

import { byId, onReady } from './dom';
import { chooseDroppedFile, summarizeFile, type PickedFile } from './uploadForm';

function start(): void {
    const fileInput = byId('file', HTMLInputElement);
    const uploadArea = byId('uploadArea', HTMLLabelElement);
    const fileInfo = byId('fileInfo', HTMLDivElement);
    const fileName = byId('fileName', HTMLSpanElement);
    const fileSize = byId('fileSize', HTMLSpanElement);

    const showFile = (file: PickedFile | undefined) => {
        if (!file) {
            fileInfo.hidden = true;
            return;
        }
        const summary = summarizeFile(file);
        fileName.textContent = summary.name;
        fileSize.textContent = summary.size;
        fileInfo.hidden = false;
    };

    fileInput.addEventListener('change', () => showFile(fileInput.files?.[0]));

    uploadArea.addEventListener('dragover', (event) => {
        event.preventDefault();
        uploadArea.classList.add('dragover');
    });
    uploadArea.addEventListener('dragleave', (event) => {
        event.preventDefault();
        uploadArea.classList.remove('dragover');
    });
    uploadArea.addEventListener('drop', (event) => {
        event.preventDefault();
        uploadArea.classList.remove('dragover');

        const files = event.dataTransfer?.files;
        if (!files) return;
        const result = chooseDroppedFile(files);
        switch (result.kind) {
            case 'accepted':
                fileInput.files = files;
                showFile(result.file);
                break;
            case 'rejected':
                window.alert(result.message);
                break;
            case 'empty':
                break;
        }
    });
}

onReady(start);
