import { useEffect, useState } from "react";

type ModelOption = {
  key: "flash" | "pro";
  label: string;
};

type SyllabusOptions = {
  classTypes: Array<"upskill" | "language">;
  classFormats: Array<"offline" | "online">;
  upskillScopes: string[];
  languages: string[];
};

type SyllabusResult = {
  syllabus: string;
  prompt: string;
  model: string;
  parameters: { temperature: number; maxOutputTokens?: number };
  references: Array<{ uri: string; url: string }>;
};

type FormState = {
  model: ModelOption["key"];
  companyName: string;
  companyIndustry: string;
  jobTitle: string;
  jobLevel: string;
  classType: "upskill" | "language";
  scopes: string[];
  classFormat: "offline" | "online";
  learningObjective: string;
};

type ResultTab = "syllabus" | "prompt";

const initialForm: FormState = {
  model: "flash",
  companyName: "Company Name",
  companyIndustry: "Company Industry",
  jobTitle: "Job Title",
  jobLevel: "Job Level",
  classType: "upskill",
  scopes: [],
  classFormat: "offline",
  learningObjective: "Learning Objective"
};

function errorMessage(code: string | undefined, status: number): string {
  switch (code) {
    case "invalid_request":
      return "Please fill in every field before generating.";
    case "response_blocked":
      return "The model declined to answer this request. Try rewording the goal.";
    default:
      return `Failed to generate: ${code ?? status}`;
  }
}

export default function App() {
  const [models, setModels] = useState<ModelOption[]>([]);
  const [options, setOptions] = useState<SyllabusOptions | null>(null);
  const [form, setForm] = useState<FormState>(initialForm);
  const [loading, setLoading] = useState(false);
  const [formError, setFormError] = useState<string | null>(null);
  const [result, setResult] = useState<SyllabusResult | null>(null);
  const [tab, setTab] = useState<ResultTab>("syllabus");

  async function loadModels() {
    const res = await fetch("/api/models");
    const data = (await res.json()) as ModelOption[];
    setModels(data);
  }

  async function loadOptions() {
    const res = await fetch("/api/syllabus/options");
    const data = (await res.json()) as SyllabusOptions;
    setOptions(data);
  }

  useEffect(() => {
    void loadModels();
    void loadOptions();
  }, []);

  const scopeChoices = options
    ? form.classType === "language"
      ? options.languages
      : options.upskillScopes
    : [];

  const selectedLabel = models.find((m) => m.key === form.model)?.label ?? form.model;

  function setClassType(classType: FormState["classType"]) {
    // Scopes belong to one class type; switching clears them.
    setForm({ ...form, classType, scopes: [] });
  }

  function toggleScope(scope: string) {
    const scopes = form.scopes.includes(scope)
      ? form.scopes.filter((s) => s !== scope)
      : [...form.scopes, scope];
    setForm({ ...form, scopes });
  }

  async function generate(e: React.FormEvent) {
    e.preventDefault();
    setFormError(null);
    setLoading(true);
    try {
      const res = await fetch("/api/syllabus", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ ...form, stream: true })
      });
      if (!res.ok) {
        const err = (await res.json().catch(() => ({}))) as { error?: string };
        setFormError(errorMessage(err.error, res.status));
        return;
      }
      setResult((await res.json()) as SyllabusResult);
      setTab("syllabus");
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className="page">
      <header className="header">
        <div>
          <h1>Virtual Assistant</h1>
          <p>Describe a role and a learning goal to get a course syllabus drafted by Gemini.</p>
        </div>
      </header>

      <section className="card">
        <h2>Upskill syllabus generator</h2>
        <form className="form" onSubmit={(e) => void generate(e)}>
          <fieldset className="radio-group">
            <legend>Select Gemini Model</legend>
            {models.map((m) => (
              <label key={m.key}>
                <input
                  type="radio"
                  name="model"
                  checked={form.model === m.key}
                  onChange={() => setForm({ ...form, model: m.key })}
                />
                {m.label}
              </label>
            ))}
          </fieldset>

          <label>
            Company name
            <input
              value={form.companyName}
              onChange={(e) => setForm({ ...form, companyName: e.target.value })}
              required
            />
          </label>
          <label>
            Company industry
            <input
              value={form.companyIndustry}
              onChange={(e) => setForm({ ...form, companyIndustry: e.target.value })}
              required
            />
          </label>
          <label>
            Job title
            <input
              value={form.jobTitle}
              onChange={(e) => setForm({ ...form, jobTitle: e.target.value })}
              required
            />
          </label>
          <label>
            Job level
            <input
              value={form.jobLevel}
              onChange={(e) => setForm({ ...form, jobLevel: e.target.value })}
              required
            />
          </label>

          <fieldset className="radio-group">
            <legend>Class type</legend>
            {(options?.classTypes ?? []).map((t) => (
              <label key={t}>
                <input
                  type="radio"
                  name="classType"
                  checked={form.classType === t}
                  onChange={() => setClassType(t)}
                />
                {t}
              </label>
            ))}
          </fieldset>

          <fieldset className="checkbox-group">
            <legend>
              {form.classType === "language"
                ? "What is the language that you need? (can select multiple)"
                : "What is the upskill scope that you need? (can select multiple)"}
            </legend>
            {scopeChoices.map((scope) => (
              <label key={scope}>
                <input
                  type="checkbox"
                  checked={form.scopes.includes(scope)}
                  onChange={() => toggleScope(scope)}
                />
                {scope}
              </label>
            ))}
          </fieldset>

          <fieldset className="radio-group">
            <legend>Class format</legend>
            {(options?.classFormats ?? []).map((f) => (
              <label key={f}>
                <input
                  type="radio"
                  name="classFormat"
                  checked={form.classFormat === f}
                  onChange={() => setForm({ ...form, classFormat: f })}
                />
                {f}
              </label>
            ))}
          </fieldset>

          <label>
            Your goal with this course
            <input
              value={form.learningObjective}
              onChange={(e) => setForm({ ...form, learningObjective: e.target.value })}
              required
            />
          </label>

          <div className="form-actions">
            <button type="submit" disabled={loading}>
              {loading ? `Generating your syllabus using ${selectedLabel} ...` : "Generate my syllabus"}
            </button>
          </div>
          {formError && <div className="form-error">{formError}</div>}
        </form>
      </section>

      {result && (
        <section className="card card-spaced">
          <div className="tabs">
            <button className={tab === "syllabus" ? "active" : ""} onClick={() => setTab("syllabus")}>
              Syllabus
            </button>
            <button className={tab === "prompt" ? "active" : ""} onClick={() => setTab("prompt")}>
              Prompt
            </button>
          </div>

          {tab === "syllabus" ? (
            result.syllabus.trim() ? (
              <div>
                <h2>Your syllabus:</h2>
                <div className="syllabus">{result.syllabus}</div>
              </div>
            ) : (
              <p className="empty">The model returned no text for this request.</p>
            )
          ) : (
            <div>
              <pre className="prompt">
                {`Parameters:\n- Model: ${result.model}\n- Temperature: ${result.parameters.temperature}\n`}
                {result.parameters.maxOutputTokens !== undefined &&
                  `- Max output tokens: ${result.parameters.maxOutputTokens}\n`}
              </pre>
              <pre className="prompt">{result.prompt}</pre>
              {result.references.length > 0 && (
                <ul className="list">
                  {result.references.map((r) => (
                    <li key={r.uri} className="list-item">
                      <a href={r.url} target="_blank" rel="noreferrer">
                        {r.uri}
                      </a>
                    </li>
                  ))}
                </ul>
              )}
            </div>
          )}
        </section>
      )}
    </div>
  );
}
