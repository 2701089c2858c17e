// Centralized MCP tool descriptions.

export const HOST_STATUS_TOOL_DESCRIPTION = `Report whether the spreadsheet host is running, whether this server
attached to an instance the user already had open, and which documents are
currently tracked.

Call this before starting work to see what is already open.`;

export const HOST_START_TOOL_DESCRIPTION = `Attach to the running spreadsheet host, or launch a hidden instance when
none is running. Safe to call repeatedly. Document tools call this implicitly
only after it has succeeded once.`;

export const HOST_STOP_TOOL_DESCRIPTION = `Stop the session. Documents this server opened are closed WITHOUT saving;
documents the user had open are left alone. The host application itself is
only quit when this server launched it, unless force_quit is set.`;

export const HOST_CLEANUP_TOOL_DESCRIPTION = `Last-resort cleanup. Stops the session, then terminates every host process
this server launched and any host process parented by it.

Only use when host_stop did not leave a clean state. Requires force=true.`;

export const DOCUMENT_OPEN_TOOL_DESCRIPTION = `Open a workbook and keep it open for later calls. If the user already has it
open, the existing window is reused and will never be closed by this server.
Set create_if_missing to create a new workbook at the path.`;

export const DOCUMENT_SAVE_TOOL_DESCRIPTION = `Save an open workbook in place, or to save_as. The workbook keeps being
tracked under its original path.`;

export const DOCUMENT_CLOSE_TOOL_DESCRIPTION = `Close a workbook this server opened. Workbooks the user had open are refused
unless force=true. Unsaved changes are discarded unless save=true.`;

export const DOCUMENT_LIST_UNSAVED_TOOL_DESCRIPTION = `List every open workbook with unsaved changes, including ones the user
opened. Workbooks that were never saved to disk have a null path.`;

export const DOCUMENT_SAVE_ALL_TOOL_DESCRIPTION = `Save every open workbook with unsaved changes in place. Workbooks that were
never saved to disk are skipped and reported, since they have no path yet.`;

export const RANGE_READ_TOOL_DESCRIPTION = `Read a rectangular range (for example "A1:C10") from a sheet as rows of cell
values. Dates come back as ISO strings.`;

export const RANGE_WRITE_TOOL_DESCRIPTION = `Write rows of cell values into a range. Every row must have the same length.
The user's active sheet and scroll position are restored afterwards. Fails
with read_only on a workbook held open with document_open read_only=true.`;
