/**
 * HTML container listing
 */

import { posix } from "node:path";
import { html } from "hono/html";

export type ListingPageProps = {
  /** Escaped request path, used as title and as the base of every link */
  path: string;
  names: readonly string[];
  csrfToken?: string;
};

const STYLE = `
      .body {
        padding: 10px;
        font-family: sans-serif;
      }
      h3 {
        font-weight: normal;
      }
      .item {
        list-style: none;
        padding: 2px;
      }
`;

export const renderListingPage = ({ path, names, csrfToken }: ListingPageProps) => html`<html>
  <head>
    <meta charset="UTF-8">
    ${csrfToken ? html`<meta name="csrf-token" content="${csrfToken}">` : ""}
    <style>${STYLE}</style>
    <title>${path}</title>
  </head>
  <body>
    <div class="body">
      <div class="title"><h3>${path}</h3></div>
      ${
        names.length > 0
          ? html`<ul>
        ${names.map(
          (name) => html`<div class="item">
          <li><a href="${posix.join(path, name)}">${name}</a></li>
        </div>`
        )}
      </ul>`
          : html`<div class="info"><h3>Empty bucket.</h3></div>`
      }
    </div>
  </body>
</html>`;
