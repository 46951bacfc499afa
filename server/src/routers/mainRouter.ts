import express from "express";
import { createMainController } from "../controllers/mainController.js";
import type { UrlFetchService } from "../services/urlFetchService.js";

export function createMainRouter(service: UrlFetchService) {
	const router = express.Router();
	const controller = createMainController(service);

	router.post("/jobs", controller.addJob);
	router.get("/jobs", controller.listJobs);
	router.get("/jobs/:id", controller.getJob);
	router.get("/responses", controller.listResponses);
	router.get("/response", controller.getResponse);

	return router;
}
