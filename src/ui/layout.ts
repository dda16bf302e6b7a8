/** Screen geometry shared by the controller (for page sizes) and the renderer. */
export interface Layout {
  width: number;
  height: number;
  sidebarWidth: number;
  /** Rows of the connection list, excluding its title. */
  connectionRows: number;
  /** Rows of the schema tree, excluding its title. */
  schemaRows: number;
  tableWidth: number;
  /** Data rows of the table pane. */
  tableRows: number;
}

/** Tab bar, header, rule and footer around the table rows. */
export const TABLE_CHROME = 4;

export function computeLayout(width: number, height: number, connectionCount: number): Layout {
  const w = Math.max(40, width);
  const h = Math.max(8, height);
  // last line is the status / prompt line
  const body = h - 1;
  const sidebarWidth = Math.min(32, Math.floor(w / 3));
  const connectionRows = Math.max(1, Math.min(connectionCount, Math.floor(body / 3)));
  return {
    width: w,
    height: h,
    sidebarWidth,
    connectionRows,
    schemaRows: Math.max(1, body - connectionRows - 2),
    tableWidth: w - sidebarWidth - 1,
    tableRows: Math.max(1, body - TABLE_CHROME),
  };
}
