import { Router } from "express";
import { isAuthenticated } from "../middlewares/isAuthenticated";
import adminRoutes from "./admin.routes";
import lendingRoutes from "./lending.routes";

const appRoutes = Router()

appRoutes.use("/lending", isAuthenticated, lendingRoutes)
appRoutes.use("/admin", adminRoutes)

export default appRoutes
