import React from "react";
import { createRoot } from "react-dom/client";
import "./index.css";
import App from "./App";
import { configFromSearch, resolveConfig } from "./app-constants";

const el = document.getElementById("root");
if (!el) throw new Error("Root element #root not found");

const { config, seed } = configFromSearch(window.location.search);
let safeConfig = config;
try {
  resolveConfig(config);
} catch (err) {
  console.warn(`Ignoring URL configuration: ${err instanceof Error ? err.message : String(err)}`);
  safeConfig = {};
}

createRoot(el).render(
  <React.StrictMode>
    <App config={safeConfig} seed={seed} />
  </React.StrictMode>
);
