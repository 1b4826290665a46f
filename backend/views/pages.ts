// Server-rendered pages. Every interpolated value goes through escapeHtml.
import {
  ContactPreferences,
  Departments,
  RequestPriorities,
  RequestStatuses,
  type ServiceRequest,
} from '../models/ServiceRequest.js';
import type { AdminPrincipal } from '../models/AdminUser.js';
import type { PaginationMeta } from '../utils/pagination.js';
import type { ListFilterInput, RequestStats } from '../services/requestLifecycle.js';
import { allowedTransitions } from '../services/requestLifecycle.js';

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function formatDate(d: Date | null): string {
  return d ? escapeHtml(d.toISOString().replace('T', ' ').slice(0, 16)) : '-';
}

function options(values: readonly string[], selected: string | undefined, blank?: string): string {
  const head = blank === undefined ? '' : `<option value="">${escapeHtml(blank)}</option>`;
  return (
    head +
    values
      .map((v) => `<option value="${escapeHtml(v)}"${v === selected ? ' selected' : ''}>${escapeHtml(v)}</option>`)
      .join('')
  );
}

function layout(title: string, body: string, admin?: AdminPrincipal | null): string {
  const nav = admin
    ? `<a href="/dashboard">Dashboard</a> <a href="/requests">Requests</a>
       <form method="post" action="/admin/logout" class="inline"><button type="submit">Log out ${escapeHtml(admin.username)}</button></form>`
    : `<a href="/">Home</a> <a href="/submit">Submit a request</a> <a href="/admin/login">Admin</a>`;
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)} | IT Service Desk</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; background: #f8f9fa; color: #1a1a1a; }
    header { background: #1f2937; color: white; padding: 12px 24px; display: flex; gap: 16px; align-items: center; }
    header a { color: white; }
    main { max-width: 1100px; margin: 24px auto; padding: 0 24px; }
    .card { background: white; border-radius: 12px; padding: 24px; box-shadow: 0 2px 12px rgba(0,0,0,0.08); margin-bottom: 16px; }
    .errors { color: #b91c1c; }
    table { width: 100%; border-collapse: collapse; }
    th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #e5e7eb; vertical-align: top; }
    label { display: block; margin-top: 12px; }
    .inline { display: inline; }
  </style>
</head>
<body>
  <header><strong>IT Service Desk</strong> ${nav}</header>
  <main>
${body}
  </main>
</body>
</html>`;
}

export function renderErrorPage(status: number, message: string): string {
  return layout(
    `Error ${status}`,
    `<div class="card"><h2>Error ${status}</h2><p>${escapeHtml(message)}</p><p><a href="/">Back to home</a></p></div>`
  );
}

export function renderHomePage(): string {
  return layout(
    'Home',
    `<div class="card">
      <h2>Need help from IT?</h2>
      <p>Submit a service request and the support team will follow up by your preferred contact method.</p>
      <p><a href="/submit">Submit a request</a></p>
    </div>`
  );
}

export type SubmitFormState = {
  categories: readonly string[];
  values?: Record<string, string>;
  errors?: string[];
};

export function renderSubmitForm(state: SubmitFormState): string {
  const v = state.values ?? {};
  const errors = state.errors?.length
    ? `<ul class="errors">${state.errors.map((e) => `<li>${escapeHtml(e)}</li>`).join('')}</ul>`
    : '';
  return layout(
    'Submit a request',
    `<div class="card">
      <h2>Submit a service request</h2>
      ${errors}
      <form method="post" action="/submit">
        <label>Name <input name="requester_name" maxlength="100" required value="${escapeHtml(v.requester_name ?? '')}"></label>
        <label>Email <input name="contact" type="email" maxlength="120" required value="${escapeHtml(v.contact ?? '')}"></label>
        <label>Department <select name="department">${options(Departments, v.department, 'Select a department')}</select></label>
        <label>Category <select name="category" required>${options(state.categories, v.category, 'Select a category')}</select></label>
        <label>Priority <select name="priority">${options(RequestPriorities, v.priority ?? 'Medium')}</select></label>
        <label>Preferred contact <select name="contact_preference">${options(ContactPreferences, v.contact_preference ?? 'email')}</select></label>
        <label>Description <textarea name="description" rows="6" maxlength="5000" required>${escapeHtml(v.description ?? '')}</textarea></label>
        <p><button type="submit">Submit</button></p>
      </form>
    </div>`
  );
}

export function renderSubmissionSuccess(request: ServiceRequest): string {
  return layout(
    'Request submitted',
    `<div class="card">
      <h2>Request #${request.id} submitted</h2>
      <p>Thank you, ${escapeHtml(request.requesterName)}. Your ${escapeHtml(request.category)} request is <strong>${escapeHtml(request.status)}</strong>.</p>
      <p>We will contact you at ${escapeHtml(request.contact)}.</p>
      <p><a href="/submit">Submit another request</a></p>
    </div>`
  );
}

export function renderLoginPage(state: { error?: string; next?: string; username?: string } = {}): string {
  const error = state.error ? `<p class="errors">${escapeHtml(state.error)}</p>` : '';
  return layout(
    'Admin login',
    `<div class="card">
      <h2>Admin login</h2>
      ${error}
      <form method="post" action="/admin/login">
        <input type="hidden" name="next" value="${escapeHtml(state.next ?? '')}">
        <label>Username <input name="username" autocomplete="username" required value="${escapeHtml(state.username ?? '')}"></label>
        <label>Password <input name="password" type="password" autocomplete="current-password" required></label>
        <p><button type="submit">Log in</button></p>
      </form>
    </div>`
  );
}

function statusForm(r: ServiceRequest): string {
  const next = allowedTransitions(r.status);
  if (!next.length) return '';
  return `<form method="post" action="/update-status/${r.id}">
      <select name="status">${options(next, undefined)}</select>
      <input name="assigned_to" placeholder="Assign to" maxlength="100" value="${escapeHtml(r.assignedTo ?? '')}">
      <button type="submit">Update</button>
    </form>`;
}

function pageLink(filter: ListFilterInput, page: number, perPage: number): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(filter)) {
    if (typeof value === 'string' && value) params.set(key, value);
  }
  params.set('page', String(page));
  params.set('per_page', String(perPage));
  return `/requests?${escapeHtml(params.toString())}`;
}

export type RequestsPageState = {
  requests: ServiceRequest[];
  pagination: PaginationMeta;
  filter: ListFilterInput;
  categories: readonly string[];
  admin: AdminPrincipal;
};

export function renderRequestsPage(state: RequestsPageState): string {
  const { filter, pagination } = state;
  const rows = state.requests
    .map(
      (r) => `<tr>
        <td>#${r.id}</td>
        <td>${escapeHtml(r.requesterName)}<br><small>${escapeHtml(r.contact)}</small></td>
        <td>${escapeHtml(r.department ?? '-')}</td>
        <td>${escapeHtml(r.category)}</td>
        <td>${escapeHtml(r.priority)}</td>
        <td>${escapeHtml(r.status)}</td>
        <td>${escapeHtml(r.assignedTo ?? '-')}</td>
        <td>${formatDate(r.createdAt)}</td>
        <td>${escapeHtml(r.description)}</td>
        <td>${statusForm(r)}</td>
      </tr>`
    )
    .join('');

  const prev =
    pagination.page > 1 ? `<a href="${pageLink(filter, pagination.page - 1, pagination.per_page)}">Previous</a>` : '';
  const next =
    pagination.page < pagination.pages
      ? `<a href="${pageLink(filter, pagination.page + 1, pagination.per_page)}">Next</a>`
      : '';

  return layout(
    'Requests',
    `<div class="card">
      <h2>Service requests</h2>
      <form method="get" action="/requests">
        <select name="status">${options(RequestStatuses, filter.status, 'All statuses')}</select>
        <select name="category">${options(state.categories, filter.category, 'All categories')}</select>
        <select name="department">${options(Departments, filter.department, 'All departments')}</select>
        <select name="priority">${options(RequestPriorities, filter.priority, 'All priorities')}</select>
        <button type="submit">Filter</button>
      </form>
    </div>
    <div class="card">
      <table>
        <thead><tr><th>ID</th><th>Requester</th><th>Department</th><th>Category</th><th>Priority</th><th>Status</th><th>Assigned</th><th>Created</th><th>Description</th><th>Action</th></tr></thead>
        <tbody>${rows || '<tr><td colspan="10">No requests found.</td></tr>'}</tbody>
      </table>
      <p>Page ${pagination.page} of ${Math.max(1, pagination.pages)} (${pagination.total} total) ${prev} ${next}</p>
    </div>`,
    state.admin
  );
}

function countTable(title: string, counts: Record<string, number>): string {
  const rows = Object.entries(counts)
    .map(([key, count]) => `<tr><td>${escapeHtml(key)}</td><td>${count}</td></tr>`)
    .join('');
  return `<div class="card"><h3>${escapeHtml(title)}</h3><table><tbody>${rows || '<tr><td>None</td></tr>'}</tbody></table></div>`;
}

function formatDuration(seconds: number | null): string {
  if (seconds === null) return 'n/a';
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

export function renderDashboardPage(state: { stats: RequestStats; admin: AdminPrincipal }): string {
  const { stats } = state;
  const queue = stats.queue
    .map(
      (r) =>
        `<tr><td>#${r.id}</td><td>${escapeHtml(r.priority)}</td><td>${escapeHtml(r.status)}</td><td>${escapeHtml(r.category)}</td><td>${formatDate(r.createdAt)}</td></tr>`
    )
    .join('');
  const trend = stats.trend.map((p) => `<tr><td>${escapeHtml(p.date)}</td><td>${p.count}</td></tr>`).join('');

  return layout(
    'Dashboard',
    `<div class="card">
      <h2>Dashboard</h2>
      <p>Total requests: <strong>${stats.total}</strong>. Average resolution time: <strong>${formatDuration(stats.averageResolutionSeconds)}</strong>.</p>
    </div>
    ${countTable('By status', stats.byStatus)}
    ${countTable('By priority', stats.byPriority)}
    ${countTable('By category', stats.byCategory)}
    ${countTable('By department', stats.byDepartment)}
    <div class="card"><h3>Work queue</h3><table><tbody>${queue || '<tr><td>Nothing open.</td></tr>'}</tbody></table></div>
    <div class="card"><h3>Last 7 days</h3><table><tbody>${trend}</tbody></table></div>`,
    state.admin
  );
}
