import { Router } from "express";
import type { ResourceProxyPort } from "../../core/ports/outboundPorts";
import { asyncHandler, httpStatusFor } from "../errors";

/**
 * Relays allowlisted SEC resources. Answers in plain text, including errors.
 */
export const createProxyRouter = (resourceProxy: ResourceProxyPort): Router => {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const url = typeof req.query.url === "string" ? req.query.url.trim() : "";
      if (!url) {
        res.status(400).type("text/plain").send("Missing 'url' parameter");
        return;
      }

      const resource = await resourceProxy.fetchResource(url);
      if (resource.isErr()) {
        const status = httpStatusFor(resource.error);
        res
          .status(status >= 500 ? 502 : status)
          .type("text/plain")
          .send(resource.error.message);
        return;
      }

      res.set("Content-Type", resource.value.contentType);
      res.send(resource.value.body);
    }),
  );

  return router;
};
