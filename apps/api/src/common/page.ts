/** JSON body of a rendered page: its name plus the page's own context. */
export type PagePayload<T extends object = Record<string, unknown>> = T & {
  page: string;
};

export function renderPage<T extends object>(
  page: string,
  context: T,
): PagePayload<T> {
  return { ...context, page };
}

export function isPagePayload(value: unknown): value is PagePayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'page' in value &&
    typeof value.page === 'string'
  );
}
