import assert from "node:assert/strict";
import test from "node:test";

import { cleanResponseText } from "./response-text.js";

test("cleanResponseText strips citations, source lines and superscripts", () => {
  const raw = "Capybaras are rodents[1] from South America².\nSource: example.test/capybara\n\n  They  swim well[12].";
  assert.equal(cleanResponseText(raw), "Capybaras are rodents from South America. They swim well.");
});

test("cleanResponseText keeps plain text and tolerates empty input", () => {
  assert.equal(cleanResponseText("Hi there"), "Hi there");
  assert.equal(cleanResponseText(""), "");
  assert.equal(cleanResponseText("Sources: a, b"), "");
});
