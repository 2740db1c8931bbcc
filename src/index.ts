import express from "express";
import * as jobService from "./services/job.service.js";
import { parseCrawlOptions } from "./lib/options.js";

const PORT = process.env.PORT || 3001;

function createApp(): express.Express {
  const app = express();
  app.use(express.json());

  app.post("/jobs", async (req, res) => {
    const { url, options, ...rest } = req.body ?? {};

    if (typeof url !== "string" || !jobService.isCrawlableUrl(url)) {
      res.status(400).json({ error: "url must be an http(s) URL" });
      return;
    }

    // Allow options either under `options` or as top-level fields for convenience.
    const mergedOptions = {
      ...parseCrawlOptions(rest),
      ...parseCrawlOptions(options),
    };

    try {
      const job = await jobService.createJob({ url, options: mergedOptions });
      res.status(202).json(job);
    } catch (error) {
      console.error("Failed to create job:", error);
      res.status(500).json({ error: "Failed to create job" });
    }
  });

  app.get("/jobs", async (_req, res) => {
    try {
      res.json(await jobService.getJobs());
    } catch (error) {
      console.error("Failed to get jobs:", error);
      res.status(500).json({ error: "Failed to get jobs" });
    }
  });

  app.get("/jobs/:id", async (req, res) => {
    try {
      const job = await jobService.getJob(req.params.id);

      if (!job) {
        res.status(404).json({ error: "Job not found" });
        return;
      }

      res.json(job);
    } catch (error) {
      console.error("Failed to get job:", error);
      res.status(500).json({ error: "Failed to get job" });
    }
  });

  app.get("/jobs/:id/sitemap.xml", async (req, res) => {
    try {
      const sitemap = await jobService.getJobSitemap(req.params.id);

      if (sitemap === undefined) {
        res.status(404).json({ error: "Job not found" });
        return;
      }

      res.type("application/xml").send(sitemap);
    } catch (error) {
      console.error("Failed to render sitemap:", error);
      res.status(500).json({ error: "Failed to render sitemap" });
    }
  });

  app.delete("/jobs/:id", async (req, res) => {
    try {
      const found = await jobService.cancelJob(req.params.id);

      if (!found) {
        res.status(404).json({ error: "Job not found" });
        return;
      }

      res.status(202).json({ id: req.params.id });
    } catch (error) {
      console.error("Failed to cancel job:", error);
      res.status(500).json({ error: "Failed to cancel job" });
    }
  });

  return app;
}

async function main(): Promise<void> {
  const app = createApp();

  const server = app.listen(PORT, () => {
    console.log(`Crawler listening on port ${PORT}`);
  });

  process.on("SIGTERM", async () => {
    console.log("Shutting down...");
    server.close();
    await jobService.shutdown();
    process.exit(0);
  });
}

main().catch((error) => {
  console.error("Crawler error:", error);
  process.exit(1);
});
