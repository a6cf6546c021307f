/**
 * Web UI HTML Template
 *
 * 單一 HTML 頁面，inline CSS + JS，無外部依賴。
 * 支援深色/淺色主題。
 */

export function getHtmlTemplate(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Discord Notifier</title>
  <style>
    :root {
      --primary: #5865f2;
      --primary-hover: #4752c4;
      --success: #16a34a;
      --error: #dc2626;
      --bg: #ffffff;
      --bg-card: #f9fafb;
      --bg-input: #ffffff;
      --text: #111827;
      --text-secondary: #6b7280;
      --border: #e5e7eb;
      --shadow: rgba(0, 0, 0, 0.1);
    }

    @media (prefers-color-scheme: dark) {
      :root {
        --bg: #1f2937;
        --bg-card: #374151;
        --bg-input: #4b5563;
        --text: #f9fafb;
        --text-secondary: #9ca3af;
        --border: #4b5563;
        --shadow: rgba(0, 0, 0, 0.3);
      }
    }

    * { box-sizing: border-box; margin: 0; padding: 0; }

    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: var(--bg);
      color: var(--text);
      padding: 24px;
      max-width: 760px;
      margin: 0 auto;
      line-height: 1.6;
    }

    h1 {
      font-size: 1.5rem;
      margin-bottom: 24px;
      display: flex;
      align-items: center;
      justify-content: space-between;
    }

    .card {
      background: var(--bg-card);
      border: 1px solid var(--border);
      border-radius: 12px;
      padding: 20px;
      margin-bottom: 16px;
      box-shadow: 0 1px 3px var(--shadow);
    }

    .card h2 {
      font-size: 1rem;
      margin-bottom: 12px;
      color: var(--text-secondary);
      font-weight: 600;
    }

    .row {
      display: flex;
      align-items: center;
      justify-content: space-between;
      gap: 12px;
      padding: 10px 0;
      border-bottom: 1px solid var(--border);
    }

    .row:last-child { border-bottom: none; }

    .row .name { font-weight: 600; cursor: pointer; }
    .row .preview { font-size: 0.85rem; color: var(--text-secondary); white-space: pre-wrap; }

    .status-dot {
      display: inline-block;
      width: 10px;
      height: 10px;
      border-radius: 50%;
      margin-right: 6px;
    }

    .status-dot.green { background: var(--success); }
    .status-dot.gray { background: var(--text-secondary); }

    .btn {
      display: inline-flex;
      align-items: center;
      gap: 6px;
      padding: 8px 16px;
      border: none;
      border-radius: 8px;
      font-size: 0.9rem;
      font-weight: 500;
      cursor: pointer;
      transition: background 0.2s;
      color: #fff;
      background: var(--primary);
    }

    .btn:hover { background: var(--primary-hover); }
    .btn-secondary { background: var(--text-secondary); }
    .btn-secondary:hover { background: #4b5563; }
    .btn-danger { background: var(--error); }
    .btn-danger:hover { background: #991b1b; }

    label {
      display: block;
      font-size: 0.875rem;
      color: var(--text-secondary);
      margin: 12px 0 6px;
    }

    input, textarea, select {
      width: 100%;
      padding: 10px 12px;
      border: 1px solid var(--border);
      border-radius: 8px;
      font-size: 0.95rem;
      background: var(--bg-input);
      color: var(--text);
      font-family: monospace;
    }

    textarea { min-height: 120px; resize: vertical; }

    .actions { display: flex; gap: 8px; flex-wrap: wrap; margin-top: 16px; }

    .rendered {
      margin-top: 8px;
      padding: 10px 12px;
      border-radius: 8px;
      border: 1px dashed var(--border);
      white-space: pre-wrap;
      font-size: 0.9rem;
    }

    .hint { font-size: 0.8rem; color: var(--text-secondary); margin-top: 6px; }

    .message {
      padding: 10px 14px;
      border-radius: 8px;
      font-size: 0.875rem;
      margin-bottom: 16px;
      display: none;
    }

    .message.show { display: block; }
    .message.success { background: #dcfce7; color: #166534; border: 1px solid #bbf7d0; }
    .message.error { background: #fef2f2; color: #991b1b; border: 1px solid #fecaca; }

    @media (prefers-color-scheme: dark) {
      .message.success { background: #14532d; color: #bbf7d0; border-color: #166534; }
      .message.error { background: #7f1d1d; color: #fecaca; border-color: #991b1b; }
    }

    .hidden { display: none !important; }

    .footer {
      margin-top: 24px;
      text-align: center;
      font-size: 0.8rem;
      color: var(--text-secondary);
    }
  </style>
</head>
<body>
  <h1>
    <span>Discord Notifier</span>
    <span>
      <button class="btn" onclick="openEditor(null)">New notification</button>
      <button class="btn btn-secondary" onclick="toggleSettings()">Settings</button>
    </span>
  </h1>

  <div id="flash" class="message"></div>

  <!-- 通知列表 -->
  <div id="listSection" class="card">
    <h2>Notifications</h2>
    <div id="notificationList">Loading...</div>
  </div>

  <!-- 新增 / 編輯 -->
  <div id="editorSection" class="card hidden">
    <h2 id="editorTitle">New notification</h2>
    <div id="nameGroup">
      <label for="name">Name</label>
      <input type="text" id="name" placeholder="daily-standup" />
    </div>
    <label for="webhookUrl">Webhook URL</label>
    <input type="text" id="webhookUrl" placeholder="https://discord.com/api/webhooks/..." />
    <label for="message">Message</label>
    <textarea id="message" oninput="schedulePreview()"></textarea>
    <div class="hint">Placeholders: {date} → DD/MM/YYYY, {date:DD/MM}, {date:YYYY-MM-DD}</div>
    <div id="rendered" class="rendered"></div>
    <div class="actions">
      <button class="btn" onclick="saveNotification()">Save</button>
      <button id="testBtn" class="btn btn-secondary" onclick="testNotification()">Send test</button>
      <button id="deleteBtn" class="btn btn-danger" onclick="deleteNotification()">Delete</button>
      <button class="btn btn-secondary" onclick="closeEditor()">Close</button>
    </div>

    <div id="scheduleGroup">
      <label for="schedule">Schedule</label>
      <select id="schedule" onchange="toggleCustom()"></select>
      <input type="text" id="customSchedule" class="hidden" placeholder="0 9 * * 1-5" style="margin-top: 8px;" />
      <div id="scheduleStatus" class="hint"></div>
      <div class="actions">
        <button class="btn" onclick="enableSchedule()">Enable / replace schedule</button>
        <button class="btn btn-secondary" onclick="disableSchedule()">Disable</button>
      </div>
    </div>
  </div>

  <!-- 錯誤 webhook 設定 -->
  <div id="settingsSection" class="card hidden">
    <h2>Error webhook</h2>
    <label for="errorWebhook">Webhook URL for failure reports</label>
    <input type="text" id="errorWebhook" placeholder="https://discord.com/api/webhooks/..." />
    <div class="actions">
      <button class="btn" onclick="saveErrorWebhook()">Save</button>
      <button class="btn btn-secondary" onclick="testErrorWebhook()">Send test</button>
    </div>
  </div>

  <div class="footer">
    Discord Notifier
  </div>

  <script>
    let currentName = null;
    let previewTimer = null;

    async function api(method, path, body) {
      const res = await fetch(path, {
        method,
        headers: body ? { 'Content-Type': 'application/json' } : {},
        body: body ? JSON.stringify(body) : undefined,
      });
      const data = await res.json();
      if (!res.ok) {
        throw new Error(data.error || ('HTTP ' + res.status));
      }
      return data;
    }

    function showMessage(text, type) {
      const el = document.getElementById('flash');
      el.textContent = text;
      el.className = 'message show ' + type;
      // 10 秒後自動隱藏
      setTimeout(function() {
        el.classList.remove('show');
      }, 10000);
    }

    async function run(action) {
      try {
        await action();
      } catch (e) {
        showMessage(e.message, 'error');
      }
    }

    async function loadNotifications() {
      const data = await api('GET', '/api/notifications');
      const list = document.getElementById('notificationList');
      list.innerHTML = '';

      if (data.notifications.length === 0) {
        list.textContent = 'No notifications yet.';
        return;
      }

      for (const n of data.notifications) {
        const row = document.createElement('div');
        row.className = 'row';

        const info = document.createElement('div');
        const name = document.createElement('div');
        name.className = 'name';
        name.textContent = n.name;
        name.onclick = function() { run(function() { return openEditor(n.name); }); };
        const preview = document.createElement('div');
        preview.className = 'preview';
        preview.textContent = n.message_preview;
        info.appendChild(name);
        info.appendChild(preview);

        const status = document.createElement('div');
        const dot = document.createElement('span');
        dot.className = 'status-dot ' + (n.enabled ? 'green' : 'gray');
        status.appendChild(dot);
        status.appendChild(document.createTextNode(n.enabled ? n.schedule_human : 'Disabled'));
        if (n.next_run) {
          const next = document.createElement('div');
          next.className = 'hint';
          next.textContent = 'Next: ' + new Date(n.next_run).toLocaleString();
          status.appendChild(next);
        }

        row.appendChild(info);
        row.appendChild(status);
        list.appendChild(row);
      }
    }

    async function loadPresets() {
      const data = await api('GET', '/api/presets');
      const select = document.getElementById('schedule');
      select.innerHTML = '';
      for (const p of data.presets) {
        const opt = document.createElement('option');
        opt.value = p.key;
        opt.textContent = p.label + '  (' + p.cron + ')';
        select.appendChild(opt);
      }
      const custom = document.createElement('option');
      custom.value = 'custom';
      custom.textContent = 'Custom cron expression';
      select.appendChild(custom);
    }

    function toggleCustom() {
      const isCustom = document.getElementById('schedule').value === 'custom';
      document.getElementById('customSchedule').classList.toggle('hidden', !isCustom);
    }

    function renderScheduleStatus(schedule) {
      const el = document.getElementById('scheduleStatus');
      if (!schedule.enabled) {
        el.textContent = 'Not scheduled';
        return;
      }
      let text = 'Enabled: ' + schedule.schedule_human + ' (' + schedule.schedule + ')';
      if (schedule.next_run) {
        text += ' — next run ' + new Date(schedule.next_run).toLocaleString();
      }
      el.textContent = text;
    }

    async function openEditor(name) {
      currentName = name;
      document.getElementById('editorSection').classList.remove('hidden');
      document.getElementById('nameGroup').classList.toggle('hidden', name !== null);
      document.getElementById('scheduleGroup').classList.toggle('hidden', name === null);
      document.getElementById('testBtn').classList.toggle('hidden', name === null);
      document.getElementById('deleteBtn').classList.toggle('hidden', name === null);

      if (name === null) {
        document.getElementById('editorTitle').textContent = 'New notification';
        document.getElementById('name').value = '';
        document.getElementById('webhookUrl').value = '';
        document.getElementById('message').value = '';
        document.getElementById('rendered').textContent = '';
        return;
      }

      const data = await api('GET', '/api/notifications/' + encodeURIComponent(name));
      document.getElementById('editorTitle').textContent = name;
      document.getElementById('webhookUrl').value = data.webhook_url;
      document.getElementById('message').value = data.message;
      document.getElementById('rendered').textContent = data.message_rendered;
      renderScheduleStatus(data.schedule);
    }

    function closeEditor() {
      currentName = null;
      document.getElementById('editorSection').classList.add('hidden');
    }

    function schedulePreview() {
      if (previewTimer) clearTimeout(previewTimer);
      previewTimer = setTimeout(function() {
        run(async function() {
          const data = await api('POST', '/api/preview', { message: document.getElementById('message').value });
          document.getElementById('rendered').textContent = data.rendered;
        });
      }, 300);
    }

    function formValues() {
      return {
        webhook_url: document.getElementById('webhookUrl').value,
        message: document.getElementById('message').value,
      };
    }

    function saveNotification() {
      run(async function() {
        if (currentName === null) {
          const values = formValues();
          values.name = document.getElementById('name').value;
          const data = await api('POST', '/api/notifications', values);
          showMessage("Notification '" + data.name + "' created successfully!", 'success');
          await openEditor(data.name);
        } else {
          await api('PUT', '/api/notifications/' + encodeURIComponent(currentName), formValues());
          showMessage('Configuration saved!', 'success');
        }
        await loadNotifications();
      });
    }

    function testNotification() {
      run(async function() {
        const data = await api('POST', '/api/notifications/' + encodeURIComponent(currentName) + '/test');
        showMessage(data.message, 'success');
      });
    }

    function deleteNotification() {
      if (!confirm("Delete notification '" + currentName + "'?")) return;
      run(async function() {
        await api('DELETE', '/api/notifications/' + encodeURIComponent(currentName));
        showMessage("Notification '" + currentName + "' deleted.", 'success');
        closeEditor();
        await loadNotifications();
      });
    }

    function enableSchedule() {
      run(async function() {
        const data = await api('POST', '/api/notifications/' + encodeURIComponent(currentName) + '/schedule', {
          schedule: document.getElementById('schedule').value,
          custom_schedule: document.getElementById('customSchedule').value,
        });
        showMessage(data.message, 'success');
        renderScheduleStatus(data.schedule);
        await loadNotifications();
      });
    }

    function disableSchedule() {
      run(async function() {
        const data = await api('DELETE', '/api/notifications/' + encodeURIComponent(currentName) + '/schedule');
        showMessage(data.message, 'success');
        renderScheduleStatus(data.schedule);
        await loadNotifications();
      });
    }

    function toggleSettings() {
      const section = document.getElementById('settingsSection');
      section.classList.toggle('hidden');
      if (!section.classList.contains('hidden')) {
        run(async function() {
          const data = await api('GET', '/api/settings/error-webhook');
          document.getElementById('errorWebhook').value = data.webhook_url;
        });
      }
    }

    function saveErrorWebhook() {
      run(async function() {
        const data = await api('PUT', '/api/settings/error-webhook', {
          webhook_url: document.getElementById('errorWebhook').value,
        });
        showMessage(data.message, 'success');
      });
    }

    function testErrorWebhook() {
      run(async function() {
        const data = await api('POST', '/api/settings/error-webhook/test');
        showMessage(data.message, 'success');
      });
    }

    // 初始化
    run(async function() {
      await loadPresets();
      await loadNotifications();
    });
  </script>
</body>
</html>`;
}
