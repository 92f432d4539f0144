import express from "express";
import errorHandler from "../helpers/ErrorHandler";
import routes from "../routes";

const app = express();

app.use(express.json({ limit: "1mb" }));
app.use(routes);
app.use(errorHandler);

export default app;
