import { Router } from "express";
import CourseController from "./controllers/CourseController";
import GradingController from "./controllers/GradingController";
import IndexController from "./controllers/IndexController";
import LearningSessionController from "./controllers/LearningSessionController";

const router = Router();

// Service
router.get('/', IndexController.index);
router.get('/health', IndexController.health);
router.get('/timestamp', IndexController.timestamp);

// Course sessions (before the item routes so "course" is never read as an item kind)
router.get('/course/:id/session', CourseController.session);
router.post('/course/:id/engage', CourseController.engage);
router.post('/course/:id/grade', CourseController.grade);
router.post('/course/:id/certificate/request', CourseController.requestCertificate);

// Grader workflow
router.put('/grading/grades/:gradeId', GradingController.review);
router.put('/grading/grades/:gradeId/complete', GradingController.complete);
router.put('/grading/grades/:gradeId/confirm', GradingController.confirm);
router.put('/grading/appeals/:appealId/close', GradingController.closeAppeal);
router.post('/grading/courses/:courseId/learners/:learnerId', GradingController.gradeCourse);
router.put('/grading/gradebooks/:gradebookId/confirm', GradingController.confirmGradebook);

// Item sessions: exam, assignment, discussion
router.post('/discussion/:id/posts', LearningSessionController.createPost);
router.get('/:kind/:id/session', LearningSessionController.session);
router.post('/:kind/:id/attempt', LearningSessionController.start);
router.post('/:kind/:id/attempt/save', LearningSessionController.save);
router.post('/:kind/:id/attempt/submit', LearningSessionController.submit);
router.delete('/:kind/:id/attempt/deactivate', LearningSessionController.deactivate);
router.post('/:kind/:id/appeal', LearningSessionController.appeal);

export default router;
