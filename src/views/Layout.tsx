// src/views/Layout.tsx

import type { ReactNode } from 'react';

interface LayoutProps {
    title: string;
    bodyClassName?: string;
    head?: ReactNode;
    children: ReactNode;
}

export function Layout({ title, bodyClassName, head, children }: LayoutProps) {
    return (
        <html lang="en">
            <head>
                <meta charSet="utf-8" />
                <meta name="viewport" content="width=device-width, initial-scale=1" />
                <title>{title}</title>
                <link rel="stylesheet" href="/static/css/app.css" />
                {head}
            </head>
            <body className={bodyClassName}>{children}</body>
        </html>
    );
}
