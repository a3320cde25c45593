import type { ReactNode } from 'react';

interface Props {
  title: string;
  styles: string;
  children: ReactNode;
}

/** Standalone document shell; every archive page carries its own styles. */
export function AppLayout({ title, styles, children }: Props) {
  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: styles }} />
      </head>
      <body>{children}</body>
    </html>
  );
}
