import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { ErrorPage } from './error-page.js';

export function renderPage(page: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(page)}`;
}

export function renderErrorPage(statusCode: number, message: string, stack?: string): string {
  return renderPage(<ErrorPage statusCode={statusCode} message={message} stack={stack} />);
}
