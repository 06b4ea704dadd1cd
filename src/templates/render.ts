import type { VNode } from "preact";
import { render } from "preact-render-to-string";

export function renderPage<P = {}>(page: VNode<P>): string {
  return `<!DOCTYPE html>${render(page)}`;
}
