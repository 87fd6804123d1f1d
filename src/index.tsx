import React from "react";
import { createRoot } from "react-dom/client";
import { App } from "./components/app";

const container = document.getElementById("app");
if (container) {
  createRoot(container).render(<App />);
} else {
  console.error("Missing #app element");
}
