import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { ElementHandle, JSHandle, Locator, Page } from 'playwright';

import type {
  Action,
  CaptureEndpointAction,
  CheckAction,
  ClickAction,
  DeriveElementAction,
  OpenAction,
  ScrollAction,
  SelectAction,
  SelectBy,
} from '../schema/action.js';
import type { Target } from '../schema/target.js';
import { TIMEOUTS } from '../config/defaults.js';
import { formatTemplate } from '../utils/template.js';
import type { TemplateVars } from '../utils/template.js';
import { ActionError } from './errors.js';
import { attachRequestCapture } from './capture.js';
import { requirePage } from './resource.js';
import type { BrowserResource } from './resource.js';
import { resolveTarget } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

export interface ActionEnv {
  vars: TemplateVars;
  /** Used by "open" when the action does not say. */
  headless: boolean;
}

/** The value an action yields, or null when it yields none. */
export type ActionValue = string | null;

// ── Action dispatch ──────────────────────────────────────────

/**
 * Run one action against the owned browser.
 * Must only be called from an operation running on the browser Worker.
 */
export async function performAction(
  resource: BrowserResource,
  action: Action,
  env: ActionEnv,
): Promise<ActionValue> {
  const text = (template: string): string => formatTemplate(template, env.vars);

  switch (action.type) {
    case 'open':
      return openPage(resource, action, env);

    case 'navigate': {
      const page = requirePage(resource);
      await page.goto(text(action.url), {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
      });
      return page.url();
    }

    case 'click':
      await handleClick(requirePage(resource), action, env.vars);
      return null;

    case 'fill': {
      const locator = locate(resource, action.target, env.vars);
      if (action.sequential) {
        await locator.pressSequentially(text(action.text), {
          delay: action.delay,
        });
      } else {
        await locator.fill(text(action.text));
      }
      return null;
    }

    case 'press_key': {
      const page = requirePage(resource);
      const key = text(action.key);
      if (action.target) {
        await resolveTarget(page, action.target, env.vars).press(key);
      } else {
        await page.keyboard.press(key);
      }
      return null;
    }

    case 'hover':
      await locate(resource, action.target, env.vars).hover();
      return null;

    case 'focus':
      await locate(resource, action.target, env.vars).focus();
      return null;

    case 'check':
      await handleCheck(requirePage(resource), action, env.vars);
      return null;

    case 'select': {
      const locator = locate(resource, action.target, env.vars);
      await locator.selectOption(toSelectOptions(action));
      return null;
    }

    case 'upload':
      await locate(resource, action.target, env.vars).setInputFiles(
        action.files.map(text),
      );
      return null;

    case 'scroll':
      await handleScroll(requirePage(resource), action, env.vars);
      return null;

    case 'drag': {
      const source = locate(resource, action.source, env.vars);
      await source.dragTo(locate(resource, action.target, env.vars));
      return null;
    }

    case 'screenshot': {
      const page = requirePage(resource);
      const filePath = text(action.path);
      await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      if (action.target) {
        await resolveTarget(page, action.target, env.vars).screenshot({
          path: filePath,
        });
      } else {
        await page.screenshot({ path: filePath, fullPage: action.fullPage });
      }
      return filePath;
    }

    case 'wait_for':
      await locate(resource, action.target, env.vars).waitFor({
        state: 'visible',
        timeout: action.timeout ?? TIMEOUTS.WAIT_FOR_ELEMENT,
      });
      return null;

    case 'derive_element':
      return deriveElement(requirePage(resource), action, env.vars);

    case 'capture_endpoint':
      return captureEndpoint(requirePage(resource), action, env.vars);

    case 'read_body':
      return requirePage(resource).innerText('body');

    case 'close':
      return closeBrowser(resource);
  }
}

// ── Lifecycle actions ────────────────────────────────────────

async function openPage(
  resource: BrowserResource,
  action: OpenAction,
  env: ActionEnv,
): Promise<ActionValue> {
  // One browser per resource: later opens reuse the page already there.
  let page = resource.page;
  if (!page) {
    const browser =
      resource.browser ??
      (await resource.launcher.launch({
        headless: action.headless ?? env.headless,
      }));
    resource.browser = browser;
    page = await browser.newPage();
    resource.page = page;
  }

  await page.goto(formatTemplate(action.url, env.vars), {
    timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
  });
  return page.url();
}

async function closeBrowser(resource: BrowserResource): Promise<ActionValue> {
  const browser = resource.browser;
  resource.browser = null;
  resource.page = null;
  if (browser) {
    await browser.close();
  }
  return null;
}

// ── Element helpers ──────────────────────────────────────────

function locate(
  resource: BrowserResource,
  target: Target,
  vars: TemplateVars,
): Locator {
  return resolveTarget(requirePage(resource), target, vars);
}

async function handleClick(
  page: Page,
  action: ClickAction,
  vars: TemplateVars,
): Promise<void> {
  const { position, double } = action;

  if (action.target) {
    const locator = resolveTarget(page, action.target, vars);
    const options = position ? { position } : {};
    if (double) {
      await locator.dblclick(options);
    } else {
      await locator.click(options);
    }
    return;
  }

  if (position) {
    if (double) {
      await page.mouse.dblclick(position.x, position.y);
    } else {
      await page.mouse.click(position.x, position.y);
    }
    return;
  }

  throw new ActionError('click', 'needs a target or a position');
}

async function handleCheck(
  page: Page,
  action: CheckAction,
  vars: TemplateVars,
): Promise<void> {
  const locator = resolveTarget(page, action.target, vars);
  if (!action.expectChecked) {
    await locator.check();
  }
  await page.waitForTimeout(TIMEOUTS.CHECK_SETTLE);
  if (!(await locator.isChecked())) {
    throw new ActionError('check', 'element is not checked');
  }
}

type SelectOptionList = string[] | Array<{ label: string } | { value: string } | { index: number }>;

/** Map plain option strings onto Playwright's `{label|value|index}` form. */
export function toSelectOptions(
  action: Pick<SelectAction, 'options' | 'by'>,
): SelectOptionList {
  const by: SelectBy | undefined = action.by;
  switch (by) {
    case undefined:
      return [...action.options];
    case 'label':
      return action.options.map((label) => ({ label }));
    case 'value':
      return action.options.map((value) => ({ value }));
    case 'index':
      return action.options.map((raw) => {
        const index = Number(raw);
        if (!Number.isInteger(index) || index < 0) {
          throw new ActionError('select', `"${raw}" is not an option index`);
        }
        return { index };
      });
  }
}

async function handleScroll(
  page: Page,
  action: ScrollAction,
  vars: TemplateVars,
): Promise<void> {
  const { x, y } = action;
  const locator = action.target ? resolveTarget(page, action.target, vars) : null;

  switch (action.method) {
    case 'scroll_into_view':
      if (!locator) {
        throw new ActionError('scroll', '"scroll_into_view" needs a target');
      }
      await locator.scrollIntoViewIfNeeded();
      return;

    case 'mouse_wheel':
      if (locator) {
        await locator.hover();
      }
      await page.mouse.wheel(x, y);
      return;

    case 'evaluate':
      if (locator) {
        await locator.evaluate(
          (element, [dx, dy]) => {
            element.scrollTop += dy;
            element.scrollLeft += dx;
          },
          [x, y] as const,
        );
        return;
      }
      await scrollWindow(page, x, y);
      return;

    case 'page_evaluate':
      await scrollWindow(page, x, y);
      return;
  }
}

async function scrollWindow(page: Page, x: number, y: number): Promise<void> {
  await page.evaluate(
    ([dx, dy]) => {
      window.scrollBy(dx, dy);
    },
    [x, y] as const,
  );
}

// ── Derived elements ─────────────────────────────────────────

/** Attribute that marks elements tagged by "derive_element". */
export const DERIVED_REF_ATTRIBUTE = 'data-pageline-ref';

export function derivedSelector(name: string): string {
  return `[${DERIVED_REF_ATTRIBUTE}="${name}"]`;
}

async function deriveElement(
  page: Page,
  action: DeriveElementAction,
  vars: TemplateVars,
): Promise<ActionValue> {
  const source = resolveTarget(page, action.target, vars).first();
  const handle: JSHandle = await source.evaluateHandle(action.script);

  try {
    const element: ElementHandle | null = handle.asElement();
    const tagged = element
      ? await element.evaluate(
          (node, [attribute, name]) => {
            if (!(node instanceof Element)) return false;
            document
              .querySelectorAll(`[${attribute}="${name}"]`)
              .forEach((previous) => previous.removeAttribute(attribute));
            node.setAttribute(attribute, name);
            return true;
          },
          [DERIVED_REF_ATTRIBUTE, action.name] as const,
        )
      : false;
    if (!tagged) {
      throw new ActionError('derive_element', 'script did not return an element');
    }
  } finally {
    await handle.dispose();
  }

  return derivedSelector(action.name);
}

// ── Network capture ──────────────────────────────────────────

async function captureEndpoint(
  page: Page,
  action: CaptureEndpointAction,
  vars: TemplateVars,
): Promise<ActionValue> {
  const pattern = formatTemplate(action.pattern, vars);
  const capture = attachRequestCapture(page, pattern);

  try {
    if (action.reload) {
      await page.reload();
    }
    await page.waitForTimeout(action.windowMs ?? TIMEOUTS.CAPTURE_WINDOW);
  } finally {
    capture.detach();
  }

  return capture.urls.at(-1) ?? '';
}
