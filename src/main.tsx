import React from "react";
import ReactDOM from "react-dom/client";
import App from "./App";
import { setTracing } from "./logger";

const rootElement = document.getElementById("root");
if (!rootElement) {
  throw new Error("Root element #root not found");
}

setTracing(new URLSearchParams(window.location.search).has("debug"));

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);
