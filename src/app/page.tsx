// src/app/page.tsx
"use client";

import { useRef, useState } from "react";
import html2canvas from "html2canvas";
import {
  ResponsiveContainer,
  LineChart,
  Line,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
  Legend,
  BarChart,
  Bar,
  ScatterChart,
  Scatter,
} from "recharts";

import type { ChartKind, ChartSpec, PipelineOutcome } from "@/lib/types";
import { buildHistData, buildLineData, buildScatterData } from "@/lib/charts";
import { CHART_OPTIONS, DEFAULT_CHART_KIND } from "@/lib/config";
import { createRequestSequence } from "@/lib/sequence";

/* ------------------------- utils ------------------------- */
const numFmt = (v: unknown) => {
  if (typeof v !== "number" || !Number.isFinite(v)) return String(v ?? "");
  const abs = Math.abs(v);
  if (abs >= 1_000_000) return (v / 1_000_000).toFixed(1).replace(/\.0$/, "") + "M";
  if (abs >= 1_000) return (v / 1_000).toFixed(1).replace(/\.0$/, "") + "k";
  return String(Math.round(v * 100) / 100);
};

const axisTick = { fill: "#2f3273", fontSize: 12 };
const axisStroke = "rgba(47,50,115,0.35)";
const gridStroke = "rgba(47,50,115,0.12)";
const tooltipStyle = { background: "#ffffff", border: "1px solid #e9e9f2", color: "#2f3273" };

function readAsDataURL(file: File) {
  return new Promise<string>((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => (typeof reader.result === "string" ? resolve(reader.result) : reject(new Error("Unreadable file")));
    reader.onerror = () => reject(reader.error ?? new Error("Unreadable file"));
    reader.readAsDataURL(file);
  });
}

function ChartCard({ title, children }: { title: string; children: React.ReactNode }) {
  const ref = useRef<HTMLDivElement>(null);
  async function exportPNG() {
    if (!ref.current) return;
    const canvas = await html2canvas(ref.current);
    const link = document.createElement("a");
    link.download = `${title.replace(/\s+/g, "_")}.png`;
    link.href = canvas.toDataURL();
    link.click();
  }
  return (
    <div className="chart-card">
      <div className="chart-card-head">
        <p>{title}</p>
        <button className="btn btn-small" onClick={() => void exportPNG()}>Export PNG</button>
      </div>
      <div ref={ref} style={{ width: "100%", height: 380 }}>{children}</div>
    </div>
  );
}

function Graph({ spec }: { spec: ChartSpec }) {
  if (spec.kind === "line") {
    return (
      <ChartCard title={spec.title}>
        <ResponsiveContainer>
          <LineChart data={buildLineData(spec)} margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
            <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
            <XAxis dataKey="x" tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
            <YAxis tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} domain={["auto", "auto"]} />
            <Tooltip contentStyle={tooltipStyle} formatter={(v) => [numFmt(v), "y"]} />
            <Legend />
            <Line type="linear" dataKey="y" stroke="#636af2" dot={false} />
          </LineChart>
        </ResponsiveContainer>
      </ChartCard>
    );
  }
  if (spec.kind === "scatter") {
    return (
      <ChartCard title={spec.title}>
        <ResponsiveContainer>
          <ScatterChart margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
            <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
            <XAxis dataKey="x" name="x" tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
            <YAxis dataKey="y" name="y" tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
            <Tooltip contentStyle={tooltipStyle} formatter={(v, name) => [numFmt(v), String(name)]} />
            <Legend />
            <Scatter data={buildScatterData(spec)} fill="#636af2" />
          </ScatterChart>
        </ResponsiveContainer>
      </ChartCard>
    );
  }
  return (
    <ChartCard title={spec.title}>
      <ResponsiveContainer>
        <BarChart data={buildHistData(spec)} margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
          <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
          <XAxis dataKey="bin" tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
          <YAxis tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
          <Tooltip contentStyle={tooltipStyle} formatter={(v) => [numFmt(v), "count"]} />
          <Legend />
          <Bar dataKey="count" fill="#636af2" />
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

/* ------------------------- component ------------------------- */
export default function CreateGraph() {
  const [content, setContent] = useState<string | null>(null);
  const [fileName, setFileName] = useState("");
  const [chartKind, setChartKind] = useState<ChartKind>(DEFAULT_CHART_KIND);
  const [chart, setChart] = useState<ChartSpec | null>(null);
  const [loading, setLoading] = useState(false);
  const [toast, setToast] = useState("");
  const requests = useRef(createRequestSequence());

  function showToast(msg: string) { setToast(msg); setTimeout(() => setToast(""), 2600); }

  // on failure the previous chart stays on screen; stale answers are dropped
  async function update(nextContent: string | null, filename: string, kind: ChartKind) {
    if (nextContent === null) return;
    const id = requests.current.next();
    setLoading(true);
    try {
      const res = await fetch("/api/create-graph", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ content: nextContent, filename, chartKind: kind }),
      });
      const data: PipelineOutcome | { error: string } = await res.json();
      if (!requests.current.isCurrent(id)) return;
      if ("status" in data) {
        if (data.status === "ready") setChart(data.chart);
        else if (data.status === "error") showToast(data.error.message);
      } else {
        showToast(data.error);
      }
    } catch {
      if (requests.current.isCurrent(id)) showToast("Graph request failed");
    } finally {
      if (requests.current.isCurrent(id)) setLoading(false);
    }
  }

  async function onFile(file: File) {
    requests.current.invalidate();
    try {
      const dataUrl = await readAsDataURL(file);
      setContent(dataUrl);
      setFileName(file.name);
      await update(dataUrl, file.name, chartKind);
    } catch {
      showToast(`Could not read file ${file.name}`);
    }
  }

  function onKind(kind: ChartKind) {
    setChartKind(kind);
    void update(content, fileName, kind);
  }

  function cancel() {
    requests.current.invalidate();
    setLoading(false);
    setContent(null); setFileName(""); setChart(null); setChartKind(DEFAULT_CHART_KIND);
  }

  return (
    <div className="create-graph">
      {/* graph window */}
      <section className="card graph-window">
        {chart ? <Graph spec={chart} /> : <p className="small-muted">Upload a CSV file to draw a graph.</p>}
      </section>

      {/* settings bar */}
      <aside className="card settings">
        <h2 className="section-title">Customize graph</h2>

        <div className="field">
          <p>Upload data</p>
          <div className="row">
            <label className="btn btn-primary">
              CSV-file
              <input type="file" accept=".csv,text/csv" hidden onChange={(e) => { const f = e.target.files?.[0]; if (f) void onFile(f); }} />
            </label>
            <button className="btn" disabled title="Not available yet">Database</button>
          </div>
          {fileName && <div className="file-pill" title={fileName}>{fileName}</div>}
        </div>

        <div className="field">
          <p>Plot type</p>
          <div className="row" role="radiogroup">
            {CHART_OPTIONS.map((o) => (
              <button
                key={o.value}
                role="radio"
                aria-checked={chartKind === o.value}
                className="radio"
                data-active={chartKind === o.value}
                disabled={loading}
                onClick={() => onKind(o.value)}
              >
                {o.label}
              </button>
            ))}
          </div>
        </div>

        <div className="row actions">
          <button className="btn" onClick={cancel}>Cancel</button>
          <button className="btn btn-primary" disabled title="Not available yet">Create dashboard</button>
        </div>
      </aside>

      {toast && <div className="toast">{toast}</div>}
    </div>
  );
}
