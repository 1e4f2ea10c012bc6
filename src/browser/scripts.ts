// Page-side snippets for BrowserTab.evaluate. Arguments are embedded with
// JSON.stringify so selectors and text never break out of the literal.

export function pasteTextScript(selector: string, text: string): string {
  return `(() => {
  const el = document.querySelector(${JSON.stringify(selector)});
  if (!el) throw new Error("input not found: " + ${JSON.stringify(selector)});
  const text = ${JSON.stringify(text)};
  el.focus();
  const data = new DataTransfer();
  data.setData("text/plain", text);
  el.dispatchEvent(new ClipboardEvent("paste", { clipboardData: data, bubbles: true, cancelable: true }));
  const current = "value" in el ? el.value : el.innerText;
  if (!String(current || "").includes(text)) {
    if ("value" in el) {
      const proto = Object.getPrototypeOf(el);
      const setter = Object.getOwnPropertyDescriptor(proto, "value")?.set;
      if (setter) setter.call(el, text); else el.value = text;
      el.dispatchEvent(new Event("input", { bubbles: true }));
    } else {
      document.execCommand("insertText", false, text);
    }
  }
  return true;
})()`;
}

export function latestBlockScript(selector: string): string {
  return `(() => {
  const nodes = document.querySelectorAll(${JSON.stringify(selector)});
  const last = nodes.length > 0 ? nodes[nodes.length - 1] : null;
  return { turns: nodes.length, text: last ? String(last.innerText || last.textContent || "") : "" };
})()`;
}

export function authMarkerScript(authenticated: string, login: string | undefined): string {
  return `(() => {
  const visible = (selector) => {
    if (!selector) return false;
    const el = document.querySelector(selector);
    if (!el) return false;
    const rect = el.getBoundingClientRect();
    return rect.width > 0 || rect.height > 0;
  };
  if (visible(${JSON.stringify(authenticated)})) return "authenticated";
  if (visible(${JSON.stringify(login ?? "")})) return "login";
  return "unknown";
})()`;
}
