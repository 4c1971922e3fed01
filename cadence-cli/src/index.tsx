import React from "react";
import { render } from "ink";
import { App } from "./app/app.js";

render(<App />);
