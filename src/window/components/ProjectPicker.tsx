import { useMemo, useState } from 'react';
import type { FormEvent } from 'react';
import { useTracker } from '../hooks/useTracker';

export default function ProjectPicker() {
  const { snapshot, projects, switchProject, selectCountdown } = useTracker();
  const [draft, setDraft] = useState('');
  const names = useMemo(() => projects.map((p) => p.name).sort((a, b) => a.localeCompare(b)), [projects]);
  const placeholder = snapshot.mode === 'countdown' ? 'Countdown' : 'Choose a project';

  const handleAdd = (e: FormEvent) => {
    e.preventDefault();
    if (switchProject(draft)) setDraft('');
  };

  return (
    <section className="flex items-end gap-3">
      <label className="flex flex-col text-xs text-gray-500">
        Project
        <select
          value={snapshot.project ?? ''}
          onChange={(e) => switchProject(e.target.value)}
          className="mt-1 rounded border border-gray-200 px-2 py-1 text-sm"
        >
          {snapshot.project === null && <option value="">{placeholder}</option>}
          {names.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
      </label>

      <form onSubmit={handleAdd} className="flex gap-2">
        <input
          aria-label="New project name"
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          placeholder="New project"
          className="rounded border border-gray-200 px-2 py-1 text-sm"
        />
        <button type="submit" className="px-2 py-1 text-sm rounded bg-gray-100 hover:bg-gray-200">
          Add
        </button>
      </form>

      <button
        onClick={selectCountdown}
        disabled={snapshot.mode === 'countdown'}
        className="px-2 py-1 text-sm rounded bg-gray-100 hover:bg-gray-200"
      >
        Countdown
      </button>
    </section>
  );
}
