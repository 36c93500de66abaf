/**
 * Synchronous responses an action handler can return to the Frame.io UI.
 */
export interface Message {
  kind: 'message';
  title: string;
  description: string;
}

export type FormField =
  | { type: 'text'; label: string; name: string; value?: string }
  | { type: 'textarea'; label: string; name: string; value?: string }
  | { type: 'select'; label: string; name: string; options: Array<{ name: string; value: string }>; value?: string }
  | { type: 'checkbox'; label: string; name: string; value?: boolean }
  | { type: 'link'; label: string; name: string; value: string };

export interface Form {
  kind: 'form';
  title: string;
  description: string;
  fields: FormField[];
}

export type ActionResponse = Message | Form;

export function message(title: string, description: string): Message {
  return { kind: 'message', title, description };
}

export function form(title: string, description: string, fields: FormField[]): Form {
  return { kind: 'form', title, description, fields };
}

export function isActionResponse(value: unknown): value is ActionResponse {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  return value.kind === 'message' || value.kind === 'form';
}

/** Wire body sent back to Frame.io (the discriminant stays local). */
export function toResponseBody(response: ActionResponse): Record<string, unknown> {
  const { kind: _kind, ...body } = response;
  return body;
}
