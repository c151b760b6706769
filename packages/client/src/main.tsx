import React from "react";
import ReactDOM from "react-dom/client";
import { createInitialState, createStore } from "@treadmill-coach/shared";
import { App } from "./App.js";
import { createShellBridge } from "./bridge/tauri-bridge.js";
import { StoreProvider } from "./context/StoreProvider.js";
import "./styles.css";

const rootElement = document.getElementById("root");
if (!rootElement) throw new Error("Root element #root not found in document");

const store = createStore(createInitialState());
const bridge = createShellBridge();

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <StoreProvider store={store} bridge={bridge}>
      <App />
    </StoreProvider>
  </React.StrictMode>,
);
