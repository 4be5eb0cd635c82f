// test/helpers/scripts.ts
// Sample automation scripts shared by the unit and integration suites.

import { script } from './records';

/** goto, two placeholder fills, a role click, a URL wait and a visibility check. */
export const SIGN_IN_SCRIPT = script(
  "import { test, expect } from '@playwright/test';",
  '',
  "test('user can sign in', async ({ page }) => {",
  "  await page.goto('/login');",
  "  await page.fill('[placeholder=\"Email\"]', 'user@example.com');",
  "  await page.fill('[placeholder=\"Password\"]', 'test-secret');",
  "  await page.getByRole('button', { name: 'Sign in' }).click();",
  "  await page.waitForURL('**/dashboard');",
  "  await expect(page.getByText('Welcome back')).toBeVisible();",
  '});',
);

/** Three gotos with a click in between. */
export const CHECKOUT_SCRIPT = script(
  "import { test } from '@playwright/test';",
  '',
  "test('checkout flow', async ({ page }) => {",
  "  await page.goto('/products');",
  "  await page.getByTestId('add-to-cart').click();",
  "  await page.goto('/cart');",
  "  await page.getByRole('button', { name: 'Checkout' }).click();",
  "  await page.goto('/checkout');",
  '});',
);

/** The same user-menu → Logout pair on two pages. */
export const USER_MENU_SCRIPT = script(
  "import { test } from '@playwright/test';",
  '',
  "test('logout from two pages', async ({ page }) => {",
  "  await page.goto('/settings');",
  "  await page.getByTestId('user-menu').click();",
  "  await page.getByRole('menuitem', { name: 'Logout' }).click();",
  "  await page.goto('/profile');",
  "  await page.getByTestId('user-menu').click();",
  "  await page.getByRole('menuitem', { name: 'Logout' }).click();",
  '});',
);

/** No navigation or URL wait at all. */
export const NO_NAVIGATION_SCRIPT = script(
  "import { test, expect } from '@playwright/test';",
  '',
  "test('remember me', async ({ page }) => {",
  "  await page.getByRole('checkbox', { name: 'Remember me' }).check();",
  "  await expect(page.getByRole('checkbox', { name: 'Remember me' })).toBeChecked();",
  '});',
);
